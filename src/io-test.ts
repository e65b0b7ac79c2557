import { expect } from 'chai';
import { describe, it } from 'mocha';

import { StringStream } from './io';

describe('StringStream', () => {
    it('should be able to read a character', () => {
        let r = new StringStream('ab');
        expect(r.peek()).to.equal('a');
        expect(r.readChar()).to.equal('a');
        expect(r.readChar()).to.equal('b');
        expect(r.atEnd()).to.equal(true);
        expect(r.peek()).to.equal('');
        expect(() => r.readChar()).to.throw(Error);
    });

    it('should read a run of matching characters', () => {
        let r = new StringStream('123abc');
        expect(r.readWhile(ch => ch >= '0' && ch <= '9')).to.equal('123');
        expect(r.position).to.equal(3);
        expect(r.readWhile(ch => ch === ' ')).to.equal('');
        expect(r.position).to.equal(3);
    });
});
