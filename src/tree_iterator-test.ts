import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { DfsIter, IterKind, preOrder } from './tree_iterator';

// x + 2, with x in slot 0
function sum(): S.BinaryOp {
    return new S.BinaryOp({
        offset: 13,
        lhs: new S.Id({offset: 13, slot: 0}),
        op: S.BinaryOperator.Add,
        rhs: new S.Num({offset: 17, value: 2}),
    });
}

describe('DfsIter', () => {
    it('should visit fields and children depth first', () => {
        const iter = new DfsIter(sum());
        const seen: Array<[IterKind, string, S.Scalar | string]> = [];
        while (true) {
            const r = iter.next();
            if (r.isDone()) {
                expect(r.stepNo).to.equal(7);
                break;
            }
            seen.push([r.kind, r.name, r.node === null ? r.value : r.node.kind]);
            if (r.name === 'rhs') {
                iter.cut();
            } else {
                iter.step();
            }
        }
        expect(seen).to.deep.equal([
            [IterKind.Child, '', 'BinaryOp'],
            [IterKind.Field, 'offset', 13],
            [IterKind.Child, 'lhs', 'Id'],
            [IterKind.Field, 'offset', 13],
            [IterKind.Field, 'slot', 0],
            [IterKind.Field, 'op', '+'],
            [IterKind.Child, 'rhs', 'Num'],
        ]);
    });

    it('should name sequence elements by index', () => {
        const iter = new DfsIter(new S.Arr({offset: 0, elements: [new S.Null({offset: 1})]}));
        iter.next();
        iter.step();
        iter.next();
        iter.step();
        const r = iter.next();
        expect(r.name).to.equal('elements[0]');
        expect(r.isChild()).to.equal(true);
    });

    it('should require step or cut between calls to next', () => {
        const iter = new DfsIter(sum());
        iter.next();
        expect(() => iter.next()).to.throw();
    });
});

describe('preOrder', () => {
    it('should yield parents before children', () => {
        expect(Array.from(preOrder(sum()), n => n.kind)).to.deep.equal(['BinaryOp', 'Id', 'Num']);
    });

    it('should skip absent children', () => {
        const node = new S.IfElse({
            offset: 0,
            cond: new S.True({offset: 3}),
            consequent: new S.Null({offset: 12}),
            alternate: null,
        });
        expect(Array.from(preOrder(node), n => n.kind)).to.deep.equal(['IfElse', 'True', 'Null']);
    });
});
