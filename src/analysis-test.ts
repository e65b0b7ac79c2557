import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { ConstructionError, ConstructionErrorKind } from './errors';
import { TreeBuilder } from './builder';
import { readExpr } from './read_dump';
import {
    boundSlots, countNodes, frameSize, freeSlots, referencedSlots, verifySlots
} from './analysis';

// local y = 1; function(x) x + y
function closure(): {tree: S.LocalExpr, fn: S.Expr} {
    const b = new TreeBuilder();
    const tree = b.local(0, [{offset: 6, name: 'y', rhs: () => b.num(10, 1)}],
        () => b.func(13, [{name: 'x'}], () =>
            b.binary(25, b.id(25, 'x'), S.BinaryOperator.Add, b.id(29, 'y'))));
    return {tree, fn: tree.returned};
}

function verifyError(text: string, globals: number[] = []): unknown {
    try {
        verifySlots(readExpr(text), {globalSlots: globals});
    } catch (e) {
        return e;
    }
    return null;
}

describe('slot analysis', () => {
    it('should find what a function captures', () => {
        const {tree, fn} = closure();
        expect(freeSlots(fn)).to.deep.equal([0]);
        expect(boundSlots(fn)).to.deep.equal([1]);
        expect(referencedSlots(tree)).to.deep.equal([0, 1]);
        expect(freeSlots(tree)).to.deep.equal([]);
    });

    it('should size the frame from the highest slot', () => {
        const {tree, fn} = closure();
        expect(frameSize(tree)).to.equal(2);
        expect(frameSize(new S.Null({offset: 0}))).to.equal(0);
        expect(countNodes(fn)).to.equal(6);
    });
});

describe('verifySlots', () => {
    it('should accept trees from the builder', () => {
        const {tree} = closure();
        expect(() => verifySlots(tree)).to.not.throw();
    });

    it('should accept references to globals', () => {
        expect(verifyError('(Id 0 0)', [0])).to.equal(null);
    });

    it('should reject a slot with no binding', () => {
        const error = verifyError('(Id 4 3)');
        expect(error).to.be.instanceOf(ConstructionError);
        expect(error).to.include({kind: ConstructionErrorKind.UnresolvedIdentifier, offset: 4});
    });

    it('should reject a slot used outside its scope', () => {
        const error = verifyError(
            '(Arr 0 ((LocalExpr 1 ((Bind 7 0 nil (Null 11))) (Id 17 0)) (Id 20 0)))');
        expect(error).to.include({kind: ConstructionErrorKind.UnresolvedIdentifier, offset: 20});
    });

    it('should reject a slot bound twice', () => {
        const error = verifyError(
            '(Arr 0 (' +
            '(LocalExpr 1 ((Bind 7 0 nil (Null 11))) (Null 17)) ' +
            '(LocalExpr 20 ((Bind 26 0 nil (Null 30))) (Null 36))))');
        expect(error).to.include({kind: ConstructionErrorKind.DuplicateSlotBinding, offset: 20});
    });

    it('should keep object locals out of computed field names', () => {
        const error = verifyError(
            '(Obj 0 (MemberList (' +
            '(BindStmt (Bind 7 0 nil (Null 11))) ' +
            '(Field 17 (Dyn (Id 18 0)) false nil Normal (Null 22)))))');
        expect(error).to.include({kind: ConstructionErrorKind.UnresolvedIdentifier, offset: 18});
    });

    it('should let a default see a later parameter', () => {
        expect(verifyError(
            '(Function 0 (Params ((Param "a" (Id 11 1) 0) (Param "b" nil 1))) (Id 17 0))'))
            .to.equal(null);
    });
});
