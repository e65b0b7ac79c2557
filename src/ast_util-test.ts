import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { childNodes, scanEntries, treeEquals } from './ast_util';

function num(offset: number, value: number): S.Num {
    return new S.Num({offset, value});
}

describe('scanEntries', () => {
    it('should list scalar fields with their names', () => {
        expect(scanEntries(num(3, 4))).to.deep.equal([
            {type: 'field', name: 'offset', value: 3},
            {type: 'field', name: 'value', value: 4},
        ]);
    });

    it('should report operators as tags', () => {
        const node = new S.UnaryOp({offset: 0, op: S.UnaryOperator.BitNot, operand: num(1, 1)});
        expect(scanEntries(node)[1]).to.deep.equal({type: 'tag', name: 'op', value: '~'});
    });
});

describe('childNodes', () => {
    it('should skip absent children', () => {
        const cond = new S.True({offset: 3});
        const consequent = num(10, 1);
        const node = new S.IfElse({offset: 0, cond, consequent, alternate: null});
        expect(childNodes(node)).to.deep.equal([cond, consequent]);
    });

    it('should flatten sequences', () => {
        const a = num(1, 1);
        const b = num(4, 2);
        expect(childNodes(new S.Arr({offset: 0, elements: [a, b]}))).to.deep.equal([a, b]);
    });
});

describe('treeEquals', () => {
    it('should compare numbers by identity of value', () => {
        expect(treeEquals(num(0, NaN), num(0, NaN))).to.equal(true);
        expect(treeEquals(num(0, 0), num(0, -0))).to.equal(false);
    });

    it('should compare offsets', () => {
        expect(treeEquals(num(0, 1), num(1, 1))).to.equal(false);
    });

    it('should compare nested sequences', () => {
        const arr = (...values: number[]) =>
            new S.Arr({offset: 0, elements: values.map(v => num(1, v))});
        expect(treeEquals(arr(1, 2), arr(1, 2))).to.equal(true);
        expect(treeEquals(arr(1, 2), arr(1))).to.equal(false);
        expect(treeEquals(arr(1, 2), arr(1, 3))).to.equal(false);
    });

    it('should tell kinds apart', () => {
        expect(treeEquals(new S.True({offset: 0}), new S.False({offset: 0}))).to.equal(false);
    });
});
