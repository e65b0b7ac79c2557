import { expect } from 'chai';
import { describe, it } from 'mocha';

import { Scope, SlotAllocator } from './scope';

describe('SlotAllocator', () => {
    it('should hand out consecutive slots', () => {
        const slots = new SlotAllocator(3);
        expect(slots.allocate()).to.equal(3);
        expect(slots.allocate()).to.equal(4);
        expect(slots.size).to.equal(5);
    });
});

describe('Scope', () => {
    it('should find the nearest binding', () => {
        const outer = new Scope(null);
        outer.declare('x', 0);
        outer.declare('y', 1);
        const inner = new Scope(outer);
        inner.declare('x', 2);
        expect(inner.lookup('x')).to.equal(2);
        expect(inner.lookup('y')).to.equal(1);
        expect(inner.lookup('z')).to.equal(undefined);
        expect(inner.hasOwn('y')).to.equal(false);
        expect(inner.depth).to.equal(1);
    });
});
