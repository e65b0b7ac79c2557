import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { TreeBuilder } from './builder';
import { unparse } from './unparse';

const {Add, Sub, Mul, LogicalAnd} = S.BinaryOperator;

function num(value: number): S.Num {
    return new S.Num({offset: 0, value});
}

function binary(lhs: S.Expr, op: S.BinaryOperator, rhs: S.Expr): S.BinaryOp {
    return new S.BinaryOp({offset: 0, lhs, op, rhs});
}

describe('unparse', () => {
    it('should print locals with their declared names', () => {
        const b = new TreeBuilder();
        const tree = b.local(0, [{offset: 6, name: 'x', rhs: () => b.num(10, 1)}],
            () => b.binary(13, b.id(13, 'x'), Add, b.num(17, 2)));
        expect(unparse(tree, {slotNames: b.slotNames})).to.equal('local x = 1; x + 2');
        expect(unparse(tree)).to.equal('local _0 = 1; _0 + 2');
    });

    it('should print objects with field separators', () => {
        const b = new TreeBuilder({globals: ['k']});
        const obj = b.obj(0, [
            {kind: 'field', offset: 1, name: 'a', rhs: () => b.num(4, 1)},
            {kind: 'field', offset: 7, name: 'b', visibility: S.Visibility.Hidden,
             rhs: () => b.num(11, 2)},
            {kind: 'field', offset: 14, name: 'a b', rhs: () => b.null_(21)},
            {kind: 'field', offset: 27, name: () => b.id(28, 'k'), rhs: () => b.true_(32)},
            {kind: 'field', offset: 38, name: 'f', params: [{name: 'x'}], plus: true,
             visibility: S.Visibility.Unhide, rhs: () => b.id(49, 'x')},
            {kind: 'local', offset: 52, name: 'y', rhs: () => b.str(60, 'v')},
            {kind: 'assert', cond: () => b.true_(72), message: () => b.str(79, 'm')},
            {kind: 'field', offset: 84, name: 'local', rhs: () => b.self(93)},
        ]);
        expect(unparse(obj, {slotNames: b.slotNames})).to.equal(
            '{a: 1, b:: 2, "a b": null, [k]: true, f(x)+::: x, local y = "v", ' +
            'assert true : "m", "local": self}');
        expect(unparse(b.obj(0, []))).to.equal('{}');
    });

    it('should print functions with defaults', () => {
        const b = new TreeBuilder();
        const fn = b.func(0, [
            {name: 'a'},
            {name: 'b', defaultExpr: () => b.num(14, 2)},
        ], () => b.binary(17, b.id(17, 'a'), Add, b.id(19, 'b')));
        expect(unparse(fn, {slotNames: b.slotNames})).to.equal('function(a, b=2) a + b');
    });

    it('should add parentheses only where precedence needs them', () => {
        expect(unparse(binary(binary(num(1), Add, num(2)), Mul, num(3)))).to.equal('(1 + 2) * 3');
        expect(unparse(binary(num(1), Add, binary(num(2), Mul, num(3))))).to.equal('1 + 2 * 3');
        expect(unparse(binary(binary(num(1), Sub, num(2)), Sub, num(3)))).to.equal('1 - 2 - 3');
        expect(unparse(binary(num(1), Sub, binary(num(2), Sub, num(3))))).to.equal('1 - (2 - 3)');
    });

    it('should keep explicit parentheses', () => {
        const inner = new S.Parened({offset: 0, inner: binary(num(1), Mul, num(2))});
        expect(unparse(binary(inner, Add, num(3)))).to.equal('(1 * 2) + 3');
    });

    it('should separate repeated unary operators', () => {
        const minus = (operand: S.Expr) =>
            new S.UnaryOp({offset: 0, op: S.UnaryOperator.Minus, operand});
        expect(unparse(minus(minus(num(1))))).to.equal('- -1');
        const not = new S.UnaryOp({
            offset: 0,
            op: S.UnaryOperator.Not,
            operand: binary(new S.True({offset: 0}), LogicalAnd, new S.False({offset: 0})),
        });
        expect(unparse(not)).to.equal('!(true && false)');
    });

    it('should wrap open-ended forms used as operands', () => {
        const b = new TreeBuilder({globals: ['c']});
        const local = () => b.local(0, [{offset: 6, name: 'x', rhs: () => b.num(10, 1)}],
                                    () => b.id(13, 'x'));
        const names = {slotNames: b.slotNames};
        expect(unparse(b.select(0, local(), 'y'), names)).to.equal('(local x = 1; x).y');
        expect(unparse(b.binary(0, b.num(0, 1), Add, local()), names))
            .to.equal('1 + (local x = 1; x)');
        expect(unparse(b.ifElse(0, b.id(3, 'c'), local(), b.num(30, 2)), names))
            .to.equal('if c then (local x = 1; x) else 2');
        expect(unparse(b.ifElse(0, b.id(3, 'c'), local()), names))
            .to.equal('if c then local x = 1; x');
    });

    it('should print postfix forms', () => {
        const b = new TreeBuilder({globals: ['a', 'f']});
        const a = () => b.id(0, 'a');
        const names = {slotNames: b.slotNames};
        expect(unparse(b.slice(1, a(), {start: b.num(2, 1), stride: b.num(5, 2)}), names))
            .to.equal('a[1::2]');
        expect(unparse(b.slice(1, a(), {end: b.num(3, 3)}), names)).to.equal('a[:3]');
        expect(unparse(b.lookup(1, a(), b.str(2, 'k')), names)).to.equal('a["k"]');
        expect(unparse(b.apply(1, b.id(0, 'f'), [
            {value: b.num(2, 1)},
            {name: 'b', value: b.num(7, 3)},
        ]), names)).to.equal('f(1, b=3)');
    });

    it('should print comprehensions', () => {
        const b = new TreeBuilder({globals: ['xs', 'ks']});
        const names = {slotNames: b.slotNames};
        const comp = b.comp(0, () => b.id(1, 'x'), [
            {kind: 'for', offset: 3, name: 'x', iterable: () => b.id(12, 'xs')},
            {kind: 'if', offset: 15, cond: () => b.id(18, 'x')},
        ]);
        expect(unparse(comp, names)).to.equal('[x for x in xs if x]');

        const obj = b.objComp(0, {
            preLocals: [{offset: 7, name: 'a', rhs: () => b.num(11, 1)}],
            key: () => b.binary(15, b.id(15, 'k'), Add, b.id(19, 'a')),
            value: () => b.id(23, 'v'),
            postLocals: [{offset: 32, name: 'v', rhs: () => b.id(36, 'k')}],
            specs: [{kind: 'for', offset: 38, name: 'k', iterable: () => b.id(47, 'ks')}],
        });
        expect(unparse(obj, names)).to.equal(
            '{local a = 1, [k + a]: v, local v = k for k in ks}');
    });

    it('should print the remaining forms', () => {
        const b = new TreeBuilder({globals: ['o']});
        const names = {slotNames: b.slotNames};
        expect(unparse(b.import_(0, 'a.libsonnet'))).to.equal('import "a.libsonnet"');
        expect(unparse(b.importStr(0, 'b.txt'))).to.equal('importstr "b.txt"');
        expect(unparse(b.error(0, b.str(6, 'e')))).to.equal('error "e"');
        expect(unparse(b.assert(0, b.true_(7), b.str(14, 'm'), b.num(19, 1))))
            .to.equal('assert true : "m"; 1');
        expect(unparse(b.extend(0, b.id(0, 'o'), [
            {kind: 'field', offset: 3, name: 'a', plus: true, rhs: () => b.num(7, 1)},
        ]), names)).to.equal('o {a+: 1}');
        expect(unparse(b.arr(0, [b.dollar(1), b.super_(4), b.str(11, 'q"\n')])))
            .to.equal('[$, super, "q\\"\\n"]');
        expect(unparse(b.num(0, -0))).to.equal('-0');
    });

    it('should print negative numbers and odd names so they read back', () => {
        const select = (target: S.Expr, name: string) =>
            new S.Select({offset: 0, target, name});
        expect(unparse(select(num(-1), 'x'))).to.equal('(-1).x');
        expect(unparse(select(num(-0), 'x'))).to.equal('(-0).x');
        expect(unparse(select(num(2), 'x'))).to.equal('(2).x');
        expect(unparse(binary(num(-1), Mul, num(2)))).to.equal('-1 * 2');
        expect(unparse(new S.Lookup({offset: 0, target: num(-1), index: num(0)})))
            .to.equal('(-1)[0]');
        expect(unparse(select(new S.Self({offset: 0}), 'a-b'))).to.equal('self["a-b"]');
        expect(unparse(select(new S.Self({offset: 0}), 'local'))).to.equal('self["local"]');
    });

    it('should refuse numbers with no literal form', () => {
        expect(() => unparse(num(NaN))).to.throw('NaN at offset 0 has no source form');
        expect(() => unparse(binary(num(1), Add, num(-Infinity))))
            .to.throw('-Infinity at offset 0 has no source form');
    });
});
