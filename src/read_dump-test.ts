import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { ConstructionError, DumpSyntaxError } from './errors';
import { TreeBuilder } from './builder';
import { Memoizer } from './memoize';
import { dump } from './dump';
import { readDump, readExpr, tokenize } from './read_dump';
import { treeEquals } from './ast_util';
import { preOrder } from './tree_iterator';

const {Add, Mul, LogicalAnd} = S.BinaryOperator;
const {Hidden, Unhide} = S.Visibility;

// One tree with every node kind in it.
function everyKind(): S.Expr {
    const b = new TreeBuilder({globals: ['std']});
    return b.local(0, [
        {
            offset: 6,
            name: 'f',
            params: [{name: 'a'}, {name: 'b', defaultExpr: () => b.num(15, 2)}],
            rhs: () => b.binary(19, b.id(19, 'a'), Add, b.id(23, 'b')),
        },
        {
            offset: 26,
            name: 'o',
            rhs: () => b.obj(30, [
                {kind: 'local', offset: 31, name: 'h', rhs: () => b.num(41, 1)},
                {kind: 'field', offset: 44, name: 'x', rhs: () => b.id(47, 'h')},
                {kind: 'field', offset: 50, name: () => b.id(51, 'std'), visibility: Hidden,
                 rhs: () => b.unary(58, S.UnaryOperator.Minus, b.id(59, 'h'))},
                {kind: 'field', offset: 62, name: 'y', plus: true, visibility: Unhide,
                 rhs: () => b.apply(67, b.id(66, 'f'), [
                     {value: b.num(68, 1)},
                     {name: 'b', value: b.num(73, 3)},
                 ])},
                {kind: 'assert', cond: () => b.true_(84), message: () => b.str(91, 'm')},
                {kind: 'field', offset: 95, name: 'm', params: [{name: 'z'}],
                 rhs: () => b.id(101, 'z')},
            ]),
        },
    ], () => b.arr(104, [
        b.null_(105),
        b.false_(111),
        b.self(118),
        b.super_(124),
        b.dollar(131),
        b.str(134, 'q"\né'),
        b.num(143, 1.5),
        b.num(148, -0),
        b.num(152, NaN),
        b.num(157, -Infinity),
        b.num(168, 1e300),
        b.parened(175, b.id(176, 'o')),
        b.import_(180, 'a.libsonnet'),
        b.importStr(200, 'b.txt'),
        b.error(220, b.str(226, 'e')),
        b.select(230, b.id(230, 'o'), 'x'),
        b.lookup(235, b.id(235, 'o'), b.str(237, 'y')),
        b.slice(242, b.id(242, 'std'), {start: b.num(246, 1), stride: b.num(249, 2)}),
        b.assert(252, b.true_(259), null, b.num(265, 0)),
        b.ifElse(268, b.id(271, 'o'), b.num(278, 1), b.num(285, 2)),
        b.ifElse(288, b.id(291, 'o'), b.num(298, 1)),
        b.func(301, [{name: 'p'}], () => b.binary(313, b.id(313, 'p'), Mul, b.num(317, 2))),
        b.comp(320, () => b.id(321, 'e'), [
            {kind: 'for', offset: 323, name: 'e', iterable: () => b.id(332, 'std')},
            {kind: 'if', offset: 336, cond: () => b.binary(339, b.id(339, 'e'), LogicalAnd,
                                                           b.id(344, 'o'))},
        ]),
        b.extendComp(347, b.id(347, 'o'), {
            preLocals: [{offset: 356, name: 'u', rhs: () => b.num(360, 1)}],
            key: () => b.id(364, 'k'),
            value: () => b.id(368, 'w'),
            postLocals: [{offset: 377, name: 'w', rhs: () => b.id(381, 'u')}],
            specs: [
                {kind: 'for', offset: 383, name: 'k', iterable: () => b.id(392, 'std')},
                {kind: 'for', offset: 396, name: 'j', iterable: () => b.id(405, 'std')},
            ],
        }),
    ]));
}

function errorOf(f: () => unknown): unknown {
    try {
        f();
    } catch (e) {
        return e;
    }
    return null;
}

function syntaxErrorAt(text: string): number | null {
    const error = errorOf(() => readDump(text));
    return error instanceof DumpSyntaxError ? error.position : null;
}

describe('readDump', () => {
    it('should read back every node kind', () => {
        const tree = everyKind();
        const kinds = new Set(Array.from(preOrder(tree), n => n.kind));
        expect(kinds.size).to.equal(41);

        const text = dump(tree);
        const copy = readDump(text);
        expect(treeEquals(copy, tree)).to.equal(true);
        expect(dump(copy)).to.equal(text);
    });

    it('should keep special numbers apart', () => {
        const read = (text: string) => {
            const node = readExpr(text);
            return node.kind === 'Num' ? node.value : null;
        };
        expect(Object.is(read('(Num 0 -0)'), -0)).to.equal(true);
        expect(Object.is(read('(Num 0 0)'), 0)).to.equal(true);
        expect(read('(Num 0 NaN)')).to.be.NaN;
        expect(read('(Num 0 -Infinity)')).to.equal(-Infinity);
        expect(read('(Num 0 2.5e-7)')).to.equal(2.5e-7);
    });

    it('should ignore layout', () => {
        expect(readDump(' (Null\n\t3 ) ')).to.deep.equal(new S.Null({offset: 3}));
    });

    it('should decode string escapes', () => {
        expect(readDump('(Str 0 "a\\"b\\n\\u0041")'))
            .to.deep.equal(new S.Str({offset: 0, value: 'a"b\nA'}));
    });

    it('should report where the text goes wrong', () => {
        expect(syntaxErrorAt('(Foo 1)')).to.equal(1);
        expect(syntaxErrorAt('(Null 0')).to.equal(7);
        expect(syntaxErrorAt('(Null 0) x')).to.equal(9);
        expect(syntaxErrorAt('(Str 0 "abc')).to.equal(7);
        expect(syntaxErrorAt('(Num 0 1x)')).to.equal(7);
        expect(syntaxErrorAt('(Obj 0 (Null 1))')).to.equal(7);
        expect(syntaxErrorAt('(UnaryOp 0 ? (Null 1))')).to.equal(11);
        expect(syntaxErrorAt('(Arr 0 ((Null 1)')).to.equal(16);
        expect(syntaxErrorAt('')).to.equal(0);
    });

    it('should only accept expressions where an expression is expected', () => {
        const error = errorOf(() => readExpr('(Fixed "a")'));
        expect(error).to.be.instanceOf(DumpSyntaxError);
        expect(error).to.have.property('message', 'expected an expression, got Fixed at position 0');
    });

    it('should apply the same checks as direct construction', () => {
        const text = '(MemberList (' +
            '(Field 1 (Fixed "a") false nil Normal (Null 2)) ' +
            '(Field 8 (Fixed "a") false nil Normal (Null 9))))';
        expect(() => readDump(text)).to.throw(ConstructionError);
        expect(() => readDump('(Id 0 -1)')).to.throw(ConstructionError);
    });

    it('should share subtrees through a memoizer', () => {
        const memoizer = new Memoizer();
        const arr = readExpr('(Arr 0 ((Num 1 2) (Num 1 2)))', {memoizer});
        expect(arr.kind).to.equal('Arr');
        if (arr.kind === 'Arr') {
            expect(arr.elements[0]).to.equal(arr.elements[1]);
        }
    });
});

describe('tokenize', () => {
    it('should split atoms, strings and parentheses', () => {
        expect(tokenize('(a "b c")')).to.deep.equal([
            {type: 'open', position: 0},
            {type: 'atom', value: 'a', position: 1},
            {type: 'string', value: 'b c', position: 3},
            {type: 'close', position: 8},
            {type: 'end', position: 9},
        ]);
    });
});
