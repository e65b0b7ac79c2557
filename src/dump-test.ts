import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { TreeBuilder } from './builder';
import { dump, formatScalar, toTaggedJson } from './dump';
import { SexprWriter, StringWriteStream } from './write_stream';

describe('dump', () => {
    it('should write fields in declaration order', () => {
        // {a: 1, b:: 2}
        const b = new TreeBuilder();
        const obj = b.obj(0, [
            {kind: 'field', offset: 1, name: 'a', rhs: () => b.num(4, 1)},
            {kind: 'field', offset: 7, name: 'b', visibility: S.Visibility.Hidden,
             rhs: () => b.num(11, 2)},
        ]);
        expect(dump(obj)).to.equal(
            '(Obj 0 (MemberList (' +
            '(Field 1 (Fixed "a") false nil Normal (Num 4 1)) ' +
            '(Field 7 (Fixed "b") false nil Hidden (Num 11 2)))))');
    });

    it('should write empty sequences as ()', () => {
        expect(dump(new S.Arr({offset: 0, elements: []}))).to.equal('(Arr 0 ())');
    });

    it('should spell out scalars', () => {
        expect(formatScalar(null)).to.equal('nil');
        expect(formatScalar('a"b')).to.equal('"a\\"b"');
        expect(formatScalar(-0)).to.equal('-0');
        expect(formatScalar(Infinity)).to.equal('Infinity');
        expect(formatScalar(0.1)).to.equal('0.1');
        expect(formatScalar(false)).to.equal('false');
    });
});

describe('toTaggedJson', () => {
    it('should tag each node with its kind', () => {
        const node = new S.BinaryOp({
            offset: 13,
            lhs: new S.Id({offset: 13, slot: 0}),
            op: S.BinaryOperator.Add,
            rhs: new S.Num({offset: 17, value: 2}),
        });
        expect(toTaggedJson(node)).to.deep.equal({
            kind: 'BinaryOp',
            offset: 13,
            lhs: {kind: 'Id', offset: 13, slot: 0},
            op: '+',
            rhs: {kind: 'Num', offset: 17, value: 2},
        });
    });

    it('should write sequences as arrays and absent children as null', () => {
        const node = new S.Slice({
            offset: 0,
            target: new S.Arr({offset: 0, elements: [new S.True({offset: 1})]}),
            start: null,
            end: null,
            stride: null,
        });
        expect(toTaggedJson(node)).to.deep.equal({
            kind: 'Slice',
            offset: 0,
            target: {kind: 'Arr', offset: 0, elements: [{kind: 'True', offset: 1}]},
            start: null,
            end: null,
            stride: null,
        });
    });
});

describe('SexprWriter', () => {
    it('should keep one space between siblings', () => {
        const out = new StringWriteStream();
        const w = new SexprWriter(out);
        w.open('a');
        w.atom('b');
        w.open();
        w.close();
        w.open('c');
        w.close();
        w.close();
        expect(out.toString()).to.equal('(a b () (c))');
        expect(out.size).to.equal(12);
    });
});
