import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { Memoizer } from './memoize';

describe('Memoizer', () => {
    it('should return the first node for each distinct leaf', () => {
        const m = new Memoizer();
        const a = m.memo(new S.Num({offset: 1, value: 2}));
        expect(m.memo(new S.Num({offset: 1, value: 2}))).to.equal(a);
        expect(m.memo(new S.Num({offset: 2, value: 2}))).to.not.equal(a);
        expect(m.counts.get(a)).to.equal(2);
        expect(m.size).to.equal(2);
    });

    it('should keep -0 apart from 0 and NaN together with NaN', () => {
        const m = new Memoizer();
        const zero = m.memo(new S.Num({offset: 0, value: 0}));
        expect(m.memo(new S.Num({offset: 0, value: -0}))).to.not.equal(zero);
        const nan = m.memo(new S.Num({offset: 0, value: NaN}));
        expect(m.memo(new S.Num({offset: 0, value: NaN}))).to.equal(nan);
    });

    it('should not confuse a string with a number of the same spelling', () => {
        const m = new Memoizer();
        const s = m.memo(new S.Str({offset: 0, value: '1'}));
        expect(m.memo(new S.Str({offset: 0, value: '1'}))).to.equal(s);
        expect(m.memo(new S.Num({offset: 0, value: 1}))).to.not.equal(s);
    });

    it('should share parents whose children are shared', () => {
        const m = new Memoizer();
        const arr = () => m.memo(new S.Arr({offset: 0, elements: [
            m.memo(new S.Null({offset: 1})),
            m.memo(new S.True({offset: 6})),
        ]}));
        const first = arr();
        expect(arr()).to.equal(first);
        expect(m.size).to.equal(3);
    });

    it('should compare children by identity', () => {
        const m = new Memoizer();
        const arr = () => m.memo(new S.Arr({offset: 0, elements: [new S.Null({offset: 1})]}));
        expect(arr()).to.not.equal(arr());
    });
});
