import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { MemberVisitor, assertNever, visitMember } from './visitor';
import { unparse } from './unparse';

class MemberKinds implements MemberVisitor<string> {
    visitField(node: S.Field): string {
        return `field ${node.fieldName.kind}`;
    }
    visitBindStmt(node: S.BindStmt): string {
        return `local ${node.value.slot}`;
    }
    visitAssertStmt(node: S.AssertStmt): string {
        return `assert ${node.message === null ? 'bare' : 'with message'}`;
    }
}

describe('visitMember', () => {
    it('should dispatch on the member kind', () => {
        const members: S.Member[] = [
            new S.Field({
                offset: 1,
                fieldName: new S.Fixed({value: 'a'}),
                plus: false,
                params: null,
                visibility: S.Visibility.Normal,
                rhs: new S.Null({offset: 4}),
            }),
            new S.BindStmt({value: new S.Bind({
                offset: 16, slot: 3, params: null, rhs: new S.Null({offset: 20}),
            })}),
            new S.AssertStmt({condition: new S.True({offset: 32}), message: null}),
        ];
        expect(members.map(m => visitMember(m, new MemberKinds()))).to.deep.equal([
            'field Fixed', 'local 3', 'assert bare',
        ]);
    });
});

describe('assertNever', () => {
    it('should throw when reached', () => {
        const reach = (x: never) => assertNever(x);
        expect(() => reach(JSON.parse('{"kind": "Unknown"}'))).to.throw('unhandled node');
    });
});

describe('visitExpr', () => {
    it('should dispatch comprehension specs like other expressions', () => {
        const exprs: S.Expr[] = [
            new S.Null({offset: 0}),
            new S.Dollar({offset: 0}),
            new S.ForSpec({offset: 0, slot: 2, iterable: new S.Arr({offset: 9, elements: []})}),
            new S.IfSpec({offset: 0, cond: new S.False({offset: 3})}),
        ];
        expect(exprs.map(e => unparse(e))).to.deep.equal([
            'null', '$', 'for _2 in []', 'if false',
        ]);
    });
});
