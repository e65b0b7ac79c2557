import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { ConstructionError, ConstructionErrorKind } from './errors';
import { TreeBuilder } from './builder';
import { Memoizer } from './memoize';
import { dump } from './dump';

function objComp(obj: S.Obj): S.ObjComp {
    if (obj.body.kind !== 'ObjComp') {
        throw new Error(`expected ObjComp, got ${obj.body.kind}`);
    }
    return obj.body;
}

function memberList(body: S.ObjBody): S.MemberList {
    if (body.kind !== 'MemberList') {
        throw new Error(`expected MemberList, got ${body.kind}`);
    }
    return body;
}

describe('TreeBuilder', () => {
    it('should resolve a local to its slot', () => {
        // local x = 1; x + 2
        const b = new TreeBuilder();
        const tree = b.local(0, [{offset: 6, name: 'x', rhs: () => b.num(10, 1)}],
            () => b.binary(13, b.id(13, 'x'), S.BinaryOperator.Add, b.num(17, 2)));
        expect(dump(tree)).to.equal(
            '(LocalExpr 0 ((Bind 6 0 nil (Num 10 1))) (BinaryOp 13 (Id 13 0) + (Num 17 2)))');
        expect(b.frameSize).to.equal(1);
        expect(b.slotNames.get(0)).to.equal('x');
    });

    it('should give a shadowing local a new slot', () => {
        // local x = 1; [x, local x = 2; x, x]
        const b = new TreeBuilder();
        const tree = b.local(0, [{offset: 6, name: 'x', rhs: () => b.num(10, 1)}],
            () => b.arr(13, [
                b.id(14, 'x'),
                b.local(17, [{offset: 23, name: 'x', rhs: () => b.num(27, 2)}],
                        () => b.id(30, 'x')),
                b.id(33, 'x'),
            ]));
        expect(dump(tree)).to.equal(
            '(LocalExpr 0 ((Bind 6 0 nil (Num 10 1))) (Arr 13 (' +
            '(Id 14 0) ' +
            '(LocalExpr 17 ((Bind 23 1 nil (Num 27 2))) (Id 30 1)) ' +
            '(Id 33 0))))');
    });

    it('should give a shadowing parameter a new slot', () => {
        // local x = 1; function(x) x
        const b = new TreeBuilder();
        const tree = b.local(0, [{offset: 6, name: 'x', rhs: () => b.num(10, 1)}],
            () => b.func(13, [{name: 'x'}], () => b.id(25, 'x')));
        expect(dump(tree.returned)).to.equal(
            '(Function 13 (Params ((Param "x" nil 1))) (Id 25 1))');
    });

    it('should reject an identifier with no binding', () => {
        const b = new TreeBuilder();
        expect(() => b.id(5, 'y'))
            .to.throw(ConstructionError)
            .with.property('offset', 5);
        expect(() => b.id(5, 'y'))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.UnresolvedIdentifier);
    });

    it('should not leak a binding out of its scope', () => {
        // (local x = 1; x) + x
        const b = new TreeBuilder();
        b.local(1, [{offset: 7, name: 'x', rhs: () => b.num(11, 1)}], () => b.id(14, 'x'));
        expect(() => b.id(20, 'x')).to.throw(ConstructionError);
    });

    it('should let local bindings see each other', () => {
        // local a = b, b = 1; a
        const b = new TreeBuilder();
        const tree = b.local(0, [
            {offset: 6, name: 'a', rhs: () => b.id(10, 'b')},
            {offset: 13, name: 'b', rhs: () => b.num(17, 1)},
        ], () => b.id(20, 'a'));
        expect(tree.bindings.map(bind => bind.slot)).to.deep.equal([0, 1]);
        expect(tree.bindings[0].rhs).to.deep.equal(new S.Id({offset: 10, slot: 1}));
    });

    it('should let a local function call itself', () => {
        // local f(n) = f(n); f
        const b = new TreeBuilder();
        const tree = b.local(0, [{
            offset: 6,
            name: 'f',
            params: [{name: 'n'}],
            rhs: () => b.apply(14, b.id(13, 'f'), [{value: b.id(15, 'n')}]),
        }], () => b.id(19, 'f'));
        expect(dump(tree)).to.equal(
            '(LocalExpr 0 ((Bind 6 0 (Params ((Param "n" nil 1))) ' +
            '(Apply 14 (Id 13 0) (Args ((Arg nil (Id 15 1))))))) (Id 19 0))');
        expect(tree.bindings[0].isFunction()).to.equal(true);
    });

    it('should reject a local declared twice in one group', () => {
        const b = new TreeBuilder();
        expect(() => b.local(0, [
            {offset: 6, name: 'x', rhs: () => b.num(10, 1)},
            {offset: 13, name: 'x', rhs: () => b.num(17, 2)},
        ], () => b.null_(20)))
            .to.throw(ConstructionError)
            .with.property('offset', 13);
    });

    it('should reject a parameter declared twice', () => {
        const b = new TreeBuilder();
        expect(() => b.func(4, [{name: 'x'}, {name: 'x'}], () => b.null_(20)))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.DuplicateParameterName);
    });

    it('should let a default refer to any parameter of its list', () => {
        // function(a=b, b) a
        const b = new TreeBuilder();
        const fn = b.func(0, [
            {name: 'a', defaultExpr: () => b.id(11, 'b')},
            {name: 'b'},
        ], () => b.id(17, 'a'));
        expect(fn.params.entries[0].defaultExpr).to.deep.equal(new S.Id({offset: 11, slot: 1}));
        expect(Array.from(fn.params.requiredSlots)).to.deep.equal([1]);
    });

    it('should number globals first', () => {
        const b = new TreeBuilder({globals: ['std', 'env', 'std']});
        expect(Array.from(b.globals)).to.deep.equal([['std', 0], ['env', 1]]);
        const tree = b.local(0, [{offset: 6, name: 'x', rhs: () => b.id(10, 'std')}],
                             () => b.id(15, 'env'));
        expect(tree.bindings[0].slot).to.equal(2);
        expect(tree.returned).to.deep.equal(new S.Id({offset: 15, slot: 1}));
        expect(b.frameSize).to.equal(3);
    });

    it('should scope comprehension variables over later specs and the value', () => {
        // [x for x in xs if x]
        const b = new TreeBuilder({globals: ['xs']});
        const comp = b.comp(0, () => b.id(1, 'x'), [
            {kind: 'for', offset: 3, name: 'x', iterable: () => b.id(12, 'xs')},
            {kind: 'if', offset: 15, cond: () => b.id(18, 'x')},
        ]);
        expect(dump(comp)).to.equal(
            '(Comp 0 (Id 1 1) (ForSpec 3 1 (Id 12 0)) ((IfSpec 15 (Id 18 1))))');
        expect(comp.specs.map(s => s.kind)).to.deep.equal(['ForSpec', 'IfSpec']);
    });

    it('should not let a loop variable see itself in its iterable', () => {
        // [x for x in x]
        const b = new TreeBuilder();
        expect(() => b.comp(0, () => b.id(1, 'x'), [
            {kind: 'for', offset: 3, name: 'x', iterable: () => b.id(12, 'x')},
        ])).to.throw(ConstructionError);
    });

    it('should let nested loops see earlier loop variables', () => {
        // [y for x in xs for y in x]
        const b = new TreeBuilder({globals: ['xs']});
        const comp = b.comp(0, () => b.id(1, 'y'), [
            {kind: 'for', offset: 3, name: 'x', iterable: () => b.id(12, 'xs')},
            {kind: 'for', offset: 15, name: 'y', iterable: () => b.id(24, 'x')},
        ]);
        expect(dump(comp)).to.equal(
            '(Comp 0 (Id 1 2) (ForSpec 3 1 (Id 12 0)) ((ForSpec 15 2 (Id 24 1))))');
    });

    it('should scope object locals over every member but not computed names', () => {
        // {[k]: 2, local y = 1, a: y}
        const b = new TreeBuilder({globals: ['k']});
        const obj = b.obj(0, [
            {kind: 'field', offset: 1, name: () => b.id(2, 'k'), rhs: () => b.num(6, 2)},
            {kind: 'local', offset: 15, name: 'y', rhs: () => b.num(19, 1)},
            {kind: 'field', offset: 22, name: 'a', rhs: () => b.id(25, 'y')},
        ]);
        expect(dump(obj)).to.equal(
            '(Obj 0 (MemberList (' +
            '(Field 1 (Dyn (Id 2 0)) false nil Normal (Num 6 2)) ' +
            '(BindStmt (Bind 15 1 nil (Num 19 1))) ' +
            '(Field 22 (Fixed "a") false nil Normal (Id 25 1)))))');

        const b2 = new TreeBuilder();
        expect(() => b2.obj(0, [
            {kind: 'local', offset: 7, name: 'y', rhs: () => b2.num(11, 1)},
            {kind: 'field', offset: 14, name: () => b2.id(15, 'y'), rhs: () => b2.num(19, 2)},
        ])).to.throw(ConstructionError);
    });

    it('should build methods, assertions and extensions', () => {
        // base {f(x)+:: x, assert true : "m"}
        const b = new TreeBuilder({globals: ['base']});
        const ext = b.extend(0, b.id(0, 'base'), [
            {kind: 'field', offset: 6, name: 'f', params: [{name: 'x'}], plus: true,
             visibility: S.Visibility.Hidden, rhs: () => b.id(15, 'x')},
            {kind: 'assert', cond: () => b.true_(25), message: () => b.str(32, 'm')},
        ]);
        const members = memberList(ext.ext);
        expect(members.fields[0].isMethod()).to.equal(true);
        expect(members.fields[0].plus).to.equal(true);
        expect(dump(members.asserts[0])).to.equal('(AssertStmt (True 25) (Str 32 "m"))');
        expect(ext.base).to.deep.equal(new S.Id({offset: 0, slot: 0}));
    });

    it('should reject duplicate fixed field names', () => {
        const b = new TreeBuilder();
        expect(() => b.obj(0, [
            {kind: 'field', offset: 1, name: 'a', rhs: () => b.num(4, 1)},
            {kind: 'field', offset: 7, name: 'a', rhs: () => b.num(10, 2)},
        ]))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.DuplicateStaticFieldName);
    });

    it('should scope object comprehension locals', () => {
        // {local a = 1, [k + a]: v, local v = k for k in ks}
        const b = new TreeBuilder({globals: ['ks']});
        const body = objComp(b.objComp(0, {
            preLocals: [{offset: 7, name: 'a', rhs: () => b.num(11, 1)}],
            key: () => b.binary(15, b.id(15, 'k'), S.BinaryOperator.Add, b.id(19, 'a')),
            value: () => b.id(23, 'v'),
            postLocals: [{offset: 32, name: 'v', rhs: () => b.id(36, 'k')}],
            specs: [{kind: 'for', offset: 38, name: 'k', iterable: () => b.id(47, 'ks')}],
        }));
        expect(body.first.slot).to.equal(1);
        expect(body.preLocals[0].value.slot).to.equal(2);
        expect(body.postLocals[0].value.slot).to.equal(3);
        expect(dump(body.key)).to.equal('(BinaryOp 15 (Id 15 1) + (Id 19 2))');
        expect(body.value).to.deep.equal(new S.Id({offset: 23, slot: 3}));
        expect(body.postLocals[0].value.rhs).to.deep.equal(new S.Id({offset: 36, slot: 1}));
        expect(body.first.iterable).to.deep.equal(new S.Id({offset: 47, slot: 0}));
    });

    it('should not let a comprehension key see the locals after it', () => {
        const b = new TreeBuilder({globals: ['ks']});
        expect(() => b.objComp(0, {
            key: () => b.id(1, 'v'),
            value: () => b.null_(5),
            postLocals: [{offset: 11, name: 'v', rhs: () => b.null_(15)}],
            specs: [{kind: 'for', offset: 20, name: 'k', iterable: () => b.id(29, 'ks')}],
        }))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.UnresolvedIdentifier);
    });

    it('should build postfix and control forms', () => {
        const b = new TreeBuilder({globals: ['a']});
        const a = () => b.id(0, 'a');
        expect(dump(b.slice(1, a(), {start: b.num(2, 1), stride: b.num(5, 2)})))
            .to.equal('(Slice 1 (Id 0 0) (Num 2 1) nil (Num 5 2))');
        expect(dump(b.select(1, a(), 'b'))).to.equal('(Select 1 (Id 0 0) "b")');
        expect(dump(b.lookup(1, a(), b.str(2, 'c')))).to.equal('(Lookup 1 (Id 0 0) (Str 2 "c"))');
        expect(dump(b.ifElse(0, a(), b.num(10, 1)))).to.equal(
            '(IfElse 0 (Id 0 0) (Num 10 1) nil)');
        expect(dump(b.assert(0, a(), null, b.dollar(12)))).to.equal(
            '(AssertExpr 0 (AssertStmt (Id 0 0) nil) ($ 12))');
        expect(dump(b.error(0, b.str(6, 'x')))).to.equal('(Error 0 (Str 6 "x"))');
        expect(dump(b.unary(0, S.UnaryOperator.Not, a()))).to.equal('(UnaryOp 0 ! (Id 0 0))');
    });

    it('should share identical subtrees through a memoizer', () => {
        const memoizer = new Memoizer();
        const b = new TreeBuilder({memoizer});
        const arr = b.arr(0, [b.num(1, 7), b.num(1, 7), b.num(4, 7)]);
        expect(arr.elements[0]).to.equal(arr.elements[1]);
        expect(arr.elements[0]).to.not.equal(arr.elements[2]);
        expect(memoizer.counts.get(arr.elements[0])).to.equal(2);
    });
});
