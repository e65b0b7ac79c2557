import { expect } from 'chai';
import { describe, it } from 'mocha';

import { ConstructionError } from './errors';
import { CliOptions, parseArgs, run } from './main';

function options(command: CliOptions['command'], globals = 0): CliOptions {
    return {command, file: 'test.dump', globals, verbose: false};
}

describe('parseArgs', () => {
    it('should read a command and a file', () => {
        expect(parseArgs(['--check', 'a.dump'])).to.deep.equal({
            command: 'check',
            file: 'a.dump',
            globals: 0,
            verbose: false,
        });
    });

    it('should read options in any order', () => {
        expect(parseArgs(['--verbose', 'a.dump', '--globals', '2', '--stats'])).to.deep.equal({
            command: 'stats',
            file: 'a.dump',
            globals: 2,
            verbose: true,
        });
    });

    it('should reject bad command lines', () => {
        expect(() => parseArgs([])).to.throw('No command given');
        expect(() => parseArgs(['--json'])).to.throw('Filename not given.');
        expect(() => parseArgs(['--json', '--unparse', 'a'])).to.throw('More than one command');
        expect(() => parseArgs(['--check', '--globals', 'x', 'a'])).to.throw('--globals');
        expect(() => parseArgs(['--check', '--bogus', 'a'])).to.throw('Unrecognized option: --bogus');
        expect(() => parseArgs(['--check', 'a', 'b'])).to.throw('Unexpected argument: b');
    });
});

describe('run', () => {
    it('should print the canonical dump after checking', () => {
        const text = '(LocalExpr 0\n  ((Bind 6 0 nil (Num 10 1)))\n  (Id 13 0))\n';
        expect(run(options('check'), text)).to.equal(
            '(LocalExpr 0 ((Bind 6 0 nil (Num 10 1))) (Id 13 0))');
    });

    it('should check references against the global slots', () => {
        expect(() => run(options('check'), '(Id 0 1)')).to.throw(ConstructionError);
        expect(run(options('check', 2), '(Id 0 1)')).to.equal('(Id 0 1)');
    });

    it('should print statistics', () => {
        const text = '(Function 0 (Params ((Param "x" nil 1))) (BinaryOp 12 (Id 12 1) + (Id 16 0)))';
        expect(run(options('stats'), text)).to.equal(
            'nodes: 6\nframe size: 2\nfree slots: 0');
        expect(run(options('stats'), '(Null 0)')).to.equal(
            'nodes: 1\nframe size: 0\nfree slots: none');
    });

    it('should print source text', () => {
        expect(run(options('unparse'), '(BinaryOp 0 (Num 0 1) + (Num 4 2))')).to.equal('1 + 2');
    });

    it('should print tagged JSON', () => {
        expect(run(options('json'), '(Num 3 1.5)')).to.equal(
            '{\n  "kind": "Num",\n  "offset": 3,\n  "value": 1.5\n}');
    });
});
