import { expect } from 'chai';
import { describe, it } from 'mocha';

import { FrozenMap, FrozenSet, formatNumber, isIdentifier, isSlot, parseNumber } from './util';

describe('isIdentifier', () => {
    it('should accept names that are not keywords', () => {
        expect(isIdentifier('_a1')).to.equal(true);
        expect(isIdentifier('1a')).to.equal(false);
        expect(isIdentifier('a-b')).to.equal(false);
        expect(isIdentifier('self')).to.equal(false);
        expect(isIdentifier('')).to.equal(false);
    });
});

describe('numbers', () => {
    it('should read back what they write', () => {
        for (const n of [0, -0, 1.5, -2, 1e21, 5e-324, Infinity, -Infinity]) {
            expect(Object.is(parseNumber(formatNumber(n)), n)).to.equal(true);
        }
        expect(parseNumber(formatNumber(NaN))).to.be.NaN;
    });

    it('should reject text that is not a number', () => {
        expect(parseNumber('01')).to.equal(null);
        expect(parseNumber('1.')).to.equal(null);
        expect(parseNumber('0x10')).to.equal(null);
        expect(parseNumber('nil')).to.equal(null);
    });
});

describe('isSlot', () => {
    it('should accept only non-negative integers', () => {
        expect(isSlot(0)).to.equal(true);
        expect(isSlot(-1)).to.equal(false);
        expect(isSlot(0.5)).to.equal(false);
        expect(isSlot(NaN)).to.equal(false);
    });
});

describe('FrozenMap', () => {
    it('should read like the map it was built from', () => {
        const source = new Map([['x', 1], ['y', 2]]);
        const map = new FrozenMap(source);
        source.set('z', 3);
        expect(map.size).to.equal(2);
        expect(map.has('z')).to.equal(false);
        expect(Array.from(map.keys())).to.deep.equal(['x', 'y']);
        expect(Array.from(map.values())).to.deep.equal([1, 2]);
        const seen: string[] = [];
        map.forEach((value, key, self) => {
            seen.push(`${key}=${value}`);
            expect(self).to.equal(map);
        });
        expect(seen).to.deep.equal(['x=1', 'y=2']);
        expect(Object.isFrozen(map)).to.equal(true);
    });
});

describe('FrozenSet', () => {
    it('should read like the set it was built from', () => {
        const set = new FrozenSet([3, 1, 3]);
        expect(set.size).to.equal(2);
        expect(set.has(1)).to.equal(true);
        expect(Array.from(set)).to.deep.equal([3, 1]);
        expect(Array.from(set.entries())).to.deep.equal([[3, 3], [1, 1]]);
        const seen: number[] = [];
        set.forEach(value => seen.push(value));
        expect(seen).to.deep.equal([3, 1]);
    });
});
