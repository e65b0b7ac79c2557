import * as S from './schema';
import { DumpSyntaxError } from './errors';
import { Memoizer } from './memoize';
import { StringStream } from './io';
import { parseNumber } from './util';

export type Token =
    ({type: 'open', position: number} |
     {type: 'close', position: number} |
     {type: 'string', value: string, position: number} |
     {type: 'atom', value: string, position: number} |
     {type: 'end', position: number});

function isSpace(ch: string): boolean {
    return ch === ' ' || ch === '\n' || ch === '\t' || ch === '\r';
}

function isAtomChar(ch: string): boolean {
    return !isSpace(ch) && ch !== '(' && ch !== ')' && ch !== '"';
}

export function tokenize(text: string): Token[] {
    const r = new StringStream(text);
    const tokens: Token[] = [];
    while (true) {
        r.readWhile(isSpace);
        const position = r.position;
        if (r.atEnd()) {
            tokens.push({type: 'end', position});
            return tokens;
        }
        const ch = r.peek();
        if (ch === '(') {
            r.readChar();
            tokens.push({type: 'open', position});
        } else if (ch === ')') {
            r.readChar();
            tokens.push({type: 'close', position});
        } else if (ch === '"') {
            tokens.push({type: 'string', value: readString(r), position});
        } else {
            tokens.push({type: 'atom', value: r.readWhile(isAtomChar), position});
        }
    }
}

// A JSON string literal, quotes included.
function readString(r: StringStream): string {
    const start = r.position;
    r.readChar();
    while (true) {
        if (r.atEnd()) {
            throw new DumpSyntaxError('unterminated string', start);
        }
        const ch = r.readChar();
        if (ch === '"') {
            break;
        }
        if (ch === '\\') {
            if (r.atEnd()) {
                throw new DumpSyntaxError('unterminated string', start);
            }
            r.readChar();
        }
    }
    const literal = r.text.slice(start, r.position);
    let value: unknown;
    try {
        value = JSON.parse(literal);
    } catch {
        throw new DumpSyntaxError(`bad string literal ${literal}`, start);
    }
    if (typeof value !== 'string') {
        throw new DumpSyntaxError(`bad string literal ${literal}`, start);
    }
    return value;
}

export interface ReadOptions {
    // Shares identical subtrees as they are read.
    memoizer?: Memoizer;
}

// Reads a tree written by `dump`.
export function readDump(text: string, options: ReadOptions = {}): S.Node {
    const reader = new DumpReader(tokenize(text), options);
    const node = reader.readNode();
    reader.expectEnd();
    return node;
}

export function readExpr(text: string, options: ReadOptions = {}): S.Expr {
    const reader = new DumpReader(tokenize(text), options);
    const node = reader.readExpr();
    reader.expectEnd();
    return node;
}

const isBind = (n: S.Node): n is S.Bind => n.kind === 'Bind';
const isParam = (n: S.Node): n is S.Param => n.kind === 'Param';
const isParams = (n: S.Node): n is S.Params => n.kind === 'Params';
const isArg = (n: S.Node): n is S.Arg => n.kind === 'Arg';
const isArgs = (n: S.Node): n is S.Args => n.kind === 'Args';
const isFieldName = (n: S.Node): n is S.FieldName =>
    n.kind === 'Fixed' || n.kind === 'Dyn';
const isMember = (n: S.Node): n is S.Member =>
    n.kind === 'Field' || n.kind === 'BindStmt' || n.kind === 'AssertStmt';
const isBindStmt = (n: S.Node): n is S.BindStmt => n.kind === 'BindStmt';
const isAssertStmt = (n: S.Node): n is S.AssertStmt => n.kind === 'AssertStmt';
const isObjBody = (n: S.Node): n is S.ObjBody =>
    n.kind === 'MemberList' || n.kind === 'ObjComp';
const isForSpec = (n: S.Node): n is S.ForSpec => n.kind === 'ForSpec';

class DumpReader {
    private readonly tokens: ReadonlyArray<Token>;
    private readonly memoizer: Memoizer | null;
    private index: number;

    constructor(tokens: ReadonlyArray<Token>, options: ReadOptions) {
        this.tokens = tokens;
        this.memoizer = options.memoizer ?? null;
        this.index = 0;
    }

    expectEnd(): void {
        const token = this.peek();
        if (token.type !== 'end') {
            throw new DumpSyntaxError('trailing input', token.position);
        }
    }

    readNode(): S.Node {
        this.expect('open');
        const position = this.peek().position;
        const kind = this.readAtom();
        const node = this.readFields(kind, position);
        this.expect('close');
        return this.memoizer === null ? node : this.memoizer.memo(node);
    }

    readExpr(): S.Expr {
        return this.readOf(S.isExpr, 'an expression');
    }

    private peek(): Token {
        return this.tokens[this.index];
    }

    private next(): Token {
        const token = this.tokens[this.index];
        if (token.type !== 'end') {
            this.index++;
        }
        return token;
    }

    private expect(type: 'open' | 'close'): void {
        const token = this.next();
        if (token.type !== type) {
            throw new DumpSyntaxError(
                `expected ${type === 'open' ? "'('" : "')'"}`, token.position);
        }
    }

    private readAtom(): string {
        const token = this.next();
        if (token.type !== 'atom') {
            throw new DumpSyntaxError('expected an atom', token.position);
        }
        return token.value;
    }

    private isNil(): boolean {
        const token = this.peek();
        if (token.type === 'atom' && token.value === 'nil') {
            this.next();
            return true;
        }
        return false;
    }

    private readNumber(): number {
        const position = this.peek().position;
        const value = parseNumber(this.readAtom());
        if (value === null) {
            throw new DumpSyntaxError('expected a number', position);
        }
        return value;
    }

    private readBool(): boolean {
        const position = this.peek().position;
        switch (this.readAtom()) {
            case 'true': return true;
            case 'false': return false;
            default: throw new DumpSyntaxError('expected true or false', position);
        }
    }

    private readString(): string {
        const token = this.next();
        if (token.type !== 'string') {
            throw new DumpSyntaxError('expected a string', token.position);
        }
        return token.value;
    }

    private readOptString(): string | null {
        return this.isNil() ? null : this.readString();
    }

    private readTag<T extends string>(values: ReadonlyArray<T>): T {
        const position = this.peek().position;
        const atom = this.readAtom();
        const value = values.find(v => v === atom);
        if (value === undefined) {
            throw new DumpSyntaxError(`unexpected '${atom}'`, position);
        }
        return value;
    }

    private readOf<T extends S.Node>(guard: (n: S.Node) => n is T,
                                     what: string): T
    {
        const position = this.peek().position;
        const node = this.readNode();
        if (!guard(node)) {
            throw new DumpSyntaxError(`expected ${what}, got ${node.kind}`, position);
        }
        return node;
    }

    private readOptExpr(): S.Expr | null {
        return this.isNil() ? null : this.readExpr();
    }

    private readOptParams(): S.Params | null {
        return this.isNil() ? null : this.readOf(isParams, 'Params');
    }

    private readList<T>(item: () => T): T[] {
        this.expect('open');
        const result: T[] = [];
        while (this.peek().type !== 'close') {
            if (this.peek().type === 'end') {
                throw new DumpSyntaxError("expected ')'", this.peek().position);
            }
            result.push(item());
        }
        this.expect('close');
        return result;
    }

    private readExprs(): S.Expr[] {
        return this.readList(() => this.readExpr());
    }

    private readCompSpecs(): S.CompSpec[] {
        return this.readList(() => this.readOf(S.isCompSpec, 'a comprehension spec'));
    }

    private readBindStmts(): S.BindStmt[] {
        return this.readList(() => this.readOf(isBindStmt, 'BindStmt'));
    }

    // Fields in the order each node's `scan` lists them.
    private readFields(kind: string, position: number): S.Node {
        switch (kind) {
            case 'Null': return new S.Null({offset: this.readNumber()});
            case 'True': return new S.True({offset: this.readNumber()});
            case 'False': return new S.False({offset: this.readNumber()});
            case 'Self': return new S.Self({offset: this.readNumber()});
            case 'Super': return new S.Super({offset: this.readNumber()});
            case '$': return new S.Dollar({offset: this.readNumber()});
            case 'Str':
                return new S.Str({offset: this.readNumber(), value: this.readString()});
            case 'Num':
                return new S.Num({offset: this.readNumber(), value: this.readNumber()});
            case 'Id':
                return new S.Id({offset: this.readNumber(), slot: this.readNumber()});
            case 'Arr':
                return new S.Arr({offset: this.readNumber(), elements: this.readExprs()});
            case 'Obj':
                return new S.Obj({
                    offset: this.readNumber(),
                    body: this.readOf(isObjBody, 'an object body'),
                });
            case 'Parened':
                return new S.Parened({offset: this.readNumber(), inner: this.readExpr()});
            case 'UnaryOp':
                return new S.UnaryOp({
                    offset: this.readNumber(),
                    op: this.readTag(S.UNARY_OPERATORS),
                    operand: this.readExpr(),
                });
            case 'BinaryOp':
                return new S.BinaryOp({
                    offset: this.readNumber(),
                    lhs: this.readExpr(),
                    op: this.readTag(S.BINARY_OPERATORS),
                    rhs: this.readExpr(),
                });
            case 'AssertExpr':
                return new S.AssertExpr({
                    offset: this.readNumber(),
                    assertion: this.readOf(isAssertStmt, 'AssertStmt'),
                    returned: this.readExpr(),
                });
            case 'LocalExpr':
                return new S.LocalExpr({
                    offset: this.readNumber(),
                    bindings: this.readList(() => this.readOf(isBind, 'Bind')),
                    returned: this.readExpr(),
                });
            case 'Import':
                return new S.Import({offset: this.readNumber(), path: this.readString()});
            case 'ImportStr':
                return new S.ImportStr({offset: this.readNumber(), path: this.readString()});
            case 'Error':
                return new S.ErrorExpr({offset: this.readNumber(), message: this.readExpr()});
            case 'Apply':
                return new S.Apply({
                    offset: this.readNumber(),
                    target: this.readExpr(),
                    args: this.readOf(isArgs, 'Args'),
                });
            case 'Select':
                return new S.Select({
                    offset: this.readNumber(),
                    target: this.readExpr(),
                    name: this.readString(),
                });
            case 'Lookup':
                return new S.Lookup({
                    offset: this.readNumber(),
                    target: this.readExpr(),
                    index: this.readExpr(),
                });
            case 'Slice':
                return new S.Slice({
                    offset: this.readNumber(),
                    target: this.readExpr(),
                    start: this.readOptExpr(),
                    end: this.readOptExpr(),
                    stride: this.readOptExpr(),
                });
            case 'Function':
                return new S.FunctionExpr({
                    offset: this.readNumber(),
                    params: this.readOf(isParams, 'Params'),
                    body: this.readExpr(),
                });
            case 'IfElse':
                return new S.IfElse({
                    offset: this.readNumber(),
                    cond: this.readExpr(),
                    consequent: this.readExpr(),
                    alternate: this.readOptExpr(),
                });
            case 'IfSpec':
                return new S.IfSpec({offset: this.readNumber(), cond: this.readExpr()});
            case 'ForSpec':
                return new S.ForSpec({
                    offset: this.readNumber(),
                    slot: this.readNumber(),
                    iterable: this.readExpr(),
                });
            case 'Comp':
                return new S.Comp({
                    offset: this.readNumber(),
                    value: this.readExpr(),
                    first: this.readOf(isForSpec, 'ForSpec'),
                    rest: this.readCompSpecs(),
                });
            case 'ObjExtend':
                return new S.ObjExtend({
                    offset: this.readNumber(),
                    base: this.readExpr(),
                    ext: this.readOf(isObjBody, 'an object body'),
                });
            case 'Bind':
                return new S.Bind({
                    offset: this.readNumber(),
                    slot: this.readNumber(),
                    params: this.readOptParams(),
                    rhs: this.readExpr(),
                });
            case 'Param':
                return new S.Param({
                    name: this.readString(),
                    defaultExpr: this.readOptExpr(),
                    slot: this.readNumber(),
                });
            case 'Params':
                return new S.Params({
                    entries: this.readList(() => this.readOf(isParam, 'Param')),
                });
            case 'Arg':
                return new S.Arg({name: this.readOptString(), value: this.readExpr()});
            case 'Args':
                return new S.Args({
                    entries: this.readList(() => this.readOf(isArg, 'Arg')),
                });
            case 'Fixed':
                return new S.Fixed({value: this.readString()});
            case 'Dyn':
                return new S.Dyn({expr: this.readExpr()});
            case 'Field':
                return new S.Field({
                    offset: this.readNumber(),
                    fieldName: this.readOf(isFieldName, 'a field name'),
                    plus: this.readBool(),
                    params: this.readOptParams(),
                    visibility: this.readTag(S.VISIBILITIES),
                    rhs: this.readExpr(),
                });
            case 'BindStmt':
                return new S.BindStmt({value: this.readOf(isBind, 'Bind')});
            case 'AssertStmt':
                return new S.AssertStmt({
                    condition: this.readExpr(),
                    message: this.readOptExpr(),
                });
            case 'MemberList':
                return new S.MemberList({
                    members: this.readList(() => this.readOf(isMember, 'a member')),
                });
            case 'ObjComp':
                return new S.ObjComp({
                    preLocals: this.readBindStmts(),
                    key: this.readExpr(),
                    value: this.readExpr(),
                    postLocals: this.readBindStmts(),
                    first: this.readOf(isForSpec, 'ForSpec'),
                    rest: this.readCompSpecs(),
                });
            default:
                throw new DumpSyntaxError(`unknown node kind '${kind}'`, position);
        }
    }
}
