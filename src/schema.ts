import { ConstructionError, ConstructionErrorKind } from './errors';
import { FrozenMap, FrozenSet, isSlot } from './util';

/**
 * The expression tree of a template program. Trees are built once by the
 * parser, with every identifier already resolved to the integer slot of
 * the binding that introduces it, and are read-only afterwards.
 *
 * Every expression carries the offset into the source text it was parsed
 * from. Offsets are only used to report errors.
 */

export type Offset = number;
export type Slot = number;

export enum UnaryOperator {
    Plus   = "+",
    Minus  = "-",
    BitNot = "~",
    Not    = "!"
};

export enum BinaryOperator {
    Mul          = "*",
    Div          = "/",
    Mod          = "%",
    Add          = "+",
    Sub          = "-",
    Shl          = "<<",
    Shr          = ">>",
    Less         = "<",
    Greater      = ">",
    LessEqual    = "<=",
    GreaterEqual = ">=",
    In           = "in",
    Equal        = "==",
    NotEqual     = "!=",
    BitAnd       = "&",
    BitXor       = "^",
    BitOr        = "|",
    LogicalAnd   = "&&",
    LogicalOr    = "||"
};

// Field separators `:`, `::` and `:::`.
export enum Visibility {
    Normal = "Normal",
    Hidden = "Hidden",
    Unhide = "Unhide"
};

export const UNARY_OPERATORS: ReadonlyArray<UnaryOperator> =
    Object.freeze(Object.values(UnaryOperator));
export const BINARY_OPERATORS: ReadonlyArray<BinaryOperator> =
    Object.freeze(Object.values(BinaryOperator));
export const VISIBILITIES: ReadonlyArray<Visibility> =
    Object.freeze(Object.values(Visibility));

export function isVisible(v: Visibility): boolean {
    return v !== Visibility.Hidden;
}

/**
 * Visibility of a field after `base + ext`, given how each side declares
 * it (null when that side has no such field). The result is `Normal` or
 * `Hidden`.
 */
export function mergeVisibility(base: Visibility | null,
                                ext: Visibility | null): Visibility
{
    if (base === null && ext === null) {
        throw new Error('mergeVisibility: field is declared on neither side');
    }
    const inherited = (base !== null && !isVisible(base))
        ? Visibility.Hidden
        : Visibility.Normal;
    switch (ext) {
        case null:
        case Visibility.Normal:
            return inherited;
        case Visibility.Hidden:
            return Visibility.Hidden;
        case Visibility.Unhide:
            return Visibility.Normal;
    }
}

function frozen<T>(xs: ReadonlyArray<T>): ReadonlyArray<T> {
    return Object.freeze(xs.slice());
}

function checkSlot(slot: Slot, offset: Offset): Slot {
    if (!isSlot(slot)) {
        throw new ConstructionError(
            ConstructionErrorKind.InvalidSlot, `slot ${slot} is not valid`, offset);
    }
    return slot;
}

//
// Scanning
//

export type Scalar = string | number | boolean | null;

// Walks the fields of a node in declaration order.
export interface ScanHandler {
    child(name: string, node: Node | null): void;
    childArray(name: string, nodes: ReadonlyArray<Node>): void;
    field(name: string, value: Scalar): void;
    // Operator and visibility tags.
    tag(name: string, value: string): void;
}

export abstract class BaseNode {
    abstract readonly kind: string;

    abstract scan(h: ScanHandler): void;
}

//
// Literals
//

export class Null extends BaseNode {
    readonly kind = 'Null';
    readonly offset: Offset;

    constructor(params: {offset: Offset}) {
        super();
        this.offset = params.offset;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
    }
}

export class True extends BaseNode {
    readonly kind = 'True';
    readonly offset: Offset;

    constructor(params: {offset: Offset}) {
        super();
        this.offset = params.offset;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
    }
}

export class False extends BaseNode {
    readonly kind = 'False';
    readonly offset: Offset;

    constructor(params: {offset: Offset}) {
        super();
        this.offset = params.offset;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
    }
}

export class Self extends BaseNode {
    readonly kind = 'Self';
    readonly offset: Offset;

    constructor(params: {offset: Offset}) {
        super();
        this.offset = params.offset;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
    }
}

export class Super extends BaseNode {
    readonly kind = 'Super';
    readonly offset: Offset;

    constructor(params: {offset: Offset}) {
        super();
        this.offset = params.offset;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
    }
}

// `$`, the outermost object of the current object nesting.
export class Dollar extends BaseNode {
    readonly kind = '$';
    readonly offset: Offset;

    constructor(params: {offset: Offset}) {
        super();
        this.offset = params.offset;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
    }
}

export class Str extends BaseNode {
    readonly kind = 'Str';
    readonly offset: Offset;
    readonly value: string;

    constructor(params: {offset: Offset, value: string}) {
        super();
        this.offset = params.offset;
        this.value = params.value;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('value', this.value);
    }
}

export class Num extends BaseNode {
    readonly kind = 'Num';
    readonly offset: Offset;
    readonly value: number;

    constructor(params: {offset: Offset, value: number}) {
        super();
        this.offset = params.offset;
        this.value = params.value;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('value', this.value);
    }
}

// A variable reference, resolved to the slot of its binding.
export class Id extends BaseNode {
    readonly kind = 'Id';
    readonly offset: Offset;
    readonly slot: Slot;

    constructor(params: {offset: Offset, slot: Slot}) {
        super();
        this.offset = params.offset;
        this.slot = checkSlot(params.slot, params.offset);
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('slot', this.slot);
    }
}

export class Arr extends BaseNode {
    readonly kind = 'Arr';
    readonly offset: Offset;
    readonly elements: ReadonlyArray<Expr>;

    constructor(params: {offset: Offset, elements: ReadonlyArray<Expr>}) {
        super();
        this.offset = params.offset;
        this.elements = frozen(params.elements);
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.childArray('elements', this.elements);
    }
}

export class Obj extends BaseNode {
    readonly kind = 'Obj';
    readonly offset: Offset;
    readonly body: ObjBody;

    constructor(params: {offset: Offset, body: ObjBody}) {
        super();
        this.offset = params.offset;
        this.body = params.body;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('body', this.body);
    }
}

// Explicit parentheses in the source.
export class Parened extends BaseNode {
    readonly kind = 'Parened';
    readonly offset: Offset;
    readonly inner: Expr;

    constructor(params: {offset: Offset, inner: Expr}) {
        super();
        this.offset = params.offset;
        this.inner = params.inner;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('inner', this.inner);
    }
}

//
// Operators
//

export class UnaryOp extends BaseNode {
    readonly kind = 'UnaryOp';
    readonly offset: Offset;
    readonly op: UnaryOperator;
    readonly operand: Expr;

    constructor(params: {offset: Offset, op: UnaryOperator, operand: Expr}) {
        super();
        this.offset = params.offset;
        this.op = params.op;
        this.operand = params.operand;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.tag('op', this.op);
        h.child('operand', this.operand);
    }
}

export class BinaryOp extends BaseNode {
    readonly kind = 'BinaryOp';
    readonly offset: Offset;
    readonly lhs: Expr;
    readonly op: BinaryOperator;
    readonly rhs: Expr;

    constructor(params: {offset: Offset, lhs: Expr, op: BinaryOperator,
                         rhs: Expr})
    {
        super();
        this.offset = params.offset;
        this.lhs = params.lhs;
        this.op = params.op;
        this.rhs = params.rhs;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('lhs', this.lhs);
        h.tag('op', this.op);
        h.child('rhs', this.rhs);
    }
}

//
// Bindings and parameters
//

// `local name = rhs` or, with params, `local name(params) = rhs`.
export class Bind extends BaseNode {
    readonly kind = 'Bind';
    readonly offset: Offset;
    readonly slot: Slot;
    readonly params: Params | null;
    readonly rhs: Expr;

    constructor(params: {offset: Offset, slot: Slot, params: Params | null,
                         rhs: Expr})
    {
        super();
        this.offset = params.offset;
        this.slot = checkSlot(params.slot, params.offset);
        this.params = params.params;
        this.rhs = params.rhs;
        Object.freeze(this);
    }

    isFunction(): boolean {
        return this.params !== null;
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('slot', this.slot);
        h.child('params', this.params);
        h.child('rhs', this.rhs);
    }
}

export class Param extends BaseNode {
    readonly kind = 'Param';
    readonly name: string;
    readonly defaultExpr: Expr | null;
    readonly slot: Slot;

    constructor(params: {name: string, defaultExpr: Expr | null, slot: Slot}) {
        super();
        this.name = params.name;
        this.defaultExpr = params.defaultExpr;
        this.slot = params.slot;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('name', this.name);
        h.child('defaultExpr', this.defaultExpr);
        h.field('slot', this.slot);
    }
}

export interface ParamDeclaration {
    name: string;
    defaultExpr?: Expr | null;
}

export class Params extends BaseNode {
    readonly kind = 'Params';
    readonly entries: ReadonlyArray<Param>;

    // Indices derived from `entries`.
    readonly nameToSlot: ReadonlyMap<string, Slot>;
    readonly requiredSlots: ReadonlySet<Slot>;
    readonly defaultedSlots: ReadonlyArray<readonly [Slot, Expr]>;
    readonly allSlots: ReadonlySet<Slot>;

    constructor(params: {entries: ReadonlyArray<Param>}) {
        super();
        const nameToSlot = new Map<string, Slot>();
        const requiredSlots = new Set<Slot>();
        const defaultedSlots: Array<readonly [Slot, Expr]> = [];
        const allSlots = new Set<Slot>();
        for (const entry of params.entries) {
            if (!isSlot(entry.slot)) {
                throw new ConstructionError(
                    ConstructionErrorKind.InvalidSlot,
                    `parameter '${entry.name}' has slot ${entry.slot}`);
            }
            if (nameToSlot.has(entry.name)) {
                throw new ConstructionError(
                    ConstructionErrorKind.DuplicateParameterName,
                    `parameter '${entry.name}' is declared more than once`);
            }
            if (allSlots.has(entry.slot)) {
                throw new ConstructionError(
                    ConstructionErrorKind.DuplicateParameterSlot,
                    `slot ${entry.slot} is used by more than one parameter`);
            }
            nameToSlot.set(entry.name, entry.slot);
            allSlots.add(entry.slot);
            if (entry.defaultExpr === null) {
                requiredSlots.add(entry.slot);
            } else {
                defaultedSlots.push(Object.freeze([entry.slot, entry.defaultExpr] as const));
            }
        }
        this.entries = frozen(params.entries);
        this.nameToSlot = new FrozenMap(nameToSlot);
        this.requiredSlots = new FrozenSet(requiredSlots);
        this.defaultedSlots = Object.freeze(defaultedSlots);
        this.allSlots = new FrozenSet(allSlots);
        Object.freeze(this);
    }

    // Assigns consecutive slots from `firstSlot` in declaration order.
    static fromDeclarations(decls: ReadonlyArray<ParamDeclaration>,
                            firstSlot: Slot = 0): Params
    {
        return new Params({
            entries: decls.map((decl, i) => new Param({
                name: decl.name,
                defaultExpr: decl.defaultExpr ?? null,
                slot: firstSlot + i,
            })),
        });
    }

    get size(): number {
        return this.entries.length;
    }

    slotOf(name: string): Slot | undefined {
        return this.nameToSlot.get(name);
    }

    scan(h: ScanHandler) {
        h.childArray('entries', this.entries);
    }
}

export class Arg extends BaseNode {
    readonly kind = 'Arg';
    // Absent for positional arguments.
    readonly name: string | null;
    readonly value: Expr;

    constructor(params: {name: string | null, value: Expr}) {
        super();
        this.name = params.name;
        this.value = params.value;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('name', this.name);
        h.child('value', this.value);
    }
}

export class Args extends BaseNode {
    readonly kind = 'Args';
    readonly entries: ReadonlyArray<Arg>;

    constructor(params: {entries: ReadonlyArray<Arg>}) {
        super();
        this.entries = frozen(params.entries);
        Object.freeze(this);
    }

    get positional(): ReadonlyArray<Expr> {
        return this.entries.filter(a => a.name === null).map(a => a.value);
    }

    get named(): ReadonlyArray<Arg> {
        return this.entries.filter(a => a.name !== null);
    }

    scan(h: ScanHandler) {
        h.childArray('entries', this.entries);
    }
}

//
// Objects
//

export class Fixed extends BaseNode {
    readonly kind = 'Fixed';
    readonly value: string;

    constructor(params: {value: string}) {
        super();
        this.value = params.value;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('value', this.value);
    }
}

// `[expr]: ...`, a field name computed when the object is built.
export class Dyn extends BaseNode {
    readonly kind = 'Dyn';
    readonly expr: Expr;

    constructor(params: {expr: Expr}) {
        super();
        this.expr = params.expr;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.child('expr', this.expr);
    }
}

export type FieldName = (Fixed | Dyn);

export class Field extends BaseNode {
    readonly kind = 'Field';
    readonly offset: Offset;
    readonly fieldName: FieldName;
    // `+:`, merge with the same field of the object being extended.
    readonly plus: boolean;
    // Present for methods, `name(params): rhs`.
    readonly params: Params | null;
    readonly visibility: Visibility;
    readonly rhs: Expr;

    constructor(params: {offset: Offset, fieldName: FieldName, plus: boolean,
                         params: Params | null, visibility: Visibility,
                         rhs: Expr})
    {
        super();
        this.offset = params.offset;
        this.fieldName = params.fieldName;
        this.plus = params.plus;
        this.params = params.params;
        this.visibility = params.visibility;
        this.rhs = params.rhs;
        Object.freeze(this);
    }

    isMethod(): boolean {
        return this.params !== null;
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('fieldName', this.fieldName);
        h.field('plus', this.plus);
        h.child('params', this.params);
        h.tag('visibility', this.visibility);
        h.child('rhs', this.rhs);
    }
}

export class BindStmt extends BaseNode {
    readonly kind = 'BindStmt';
    readonly value: Bind;

    constructor(params: {value: Bind}) {
        super();
        this.value = params.value;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.child('value', this.value);
    }
}

export class AssertStmt extends BaseNode {
    readonly kind = 'AssertStmt';
    readonly condition: Expr;
    readonly message: Expr | null;

    constructor(params: {condition: Expr, message: Expr | null}) {
        super();
        this.condition = params.condition;
        this.message = params.message;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.child('condition', this.condition);
        h.child('message', this.message);
    }
}

export type Member = (Field | BindStmt | AssertStmt);

/**
 * The members of an object literal, in source order.
 *
 * Two fields with the same fixed name are rejected. Dynamic names are only
 * known once the object is evaluated and are not checked here.
 */
export class MemberList extends BaseNode {
    readonly kind = 'MemberList';
    readonly members: ReadonlyArray<Member>;

    constructor(params: {members: ReadonlyArray<Member>}) {
        super();
        const seen = new Set<string>();
        for (const member of params.members) {
            if (member.kind !== 'Field' || member.fieldName.kind !== 'Fixed') {
                continue;
            }
            const name = member.fieldName.value;
            if (seen.has(name)) {
                throw new ConstructionError(
                    ConstructionErrorKind.DuplicateStaticFieldName,
                    `field '${name}' is declared more than once`,
                    member.offset);
            }
            seen.add(name);
        }
        this.members = frozen(params.members);
        Object.freeze(this);
    }

    get fields(): ReadonlyArray<Field> {
        const result: Field[] = [];
        for (const member of this.members) {
            if (member.kind === 'Field') {
                result.push(member);
            }
        }
        return result;
    }

    get binds(): ReadonlyArray<BindStmt> {
        const result: BindStmt[] = [];
        for (const member of this.members) {
            if (member.kind === 'BindStmt') {
                result.push(member);
            }
        }
        return result;
    }

    get asserts(): ReadonlyArray<AssertStmt> {
        const result: AssertStmt[] = [];
        for (const member of this.members) {
            if (member.kind === 'AssertStmt') {
                result.push(member);
            }
        }
        return result;
    }

    // Fixed field names in declaration order.
    fieldNames(): string[] {
        const result: string[] = [];
        for (const field of this.fields) {
            if (field.fieldName.kind === 'Fixed') {
                result.push(field.fieldName.value);
            }
        }
        return result;
    }

    // The fixed names that show up when the object is serialized.
    visibleFieldNames(): string[] {
        const result: string[] = [];
        for (const field of this.fields) {
            if (field.fieldName.kind === 'Fixed' && isVisible(field.visibility)) {
                result.push(field.fieldName.value);
            }
        }
        return result;
    }

    scan(h: ScanHandler) {
        h.childArray('members', this.members);
    }
}

// `{ local a = ..., [key]: value, local b = ... for x in xs ... }`
export class ObjComp extends BaseNode {
    readonly kind = 'ObjComp';
    readonly preLocals: ReadonlyArray<BindStmt>;
    readonly key: Expr;
    readonly value: Expr;
    readonly postLocals: ReadonlyArray<BindStmt>;
    readonly first: ForSpec;
    readonly rest: ReadonlyArray<CompSpec>;

    constructor(params: {preLocals: ReadonlyArray<BindStmt>, key: Expr,
                         value: Expr, postLocals: ReadonlyArray<BindStmt>,
                         first: ForSpec, rest: ReadonlyArray<CompSpec>})
    {
        super();
        this.preLocals = frozen(params.preLocals);
        this.key = params.key;
        this.value = params.value;
        this.postLocals = frozen(params.postLocals);
        this.first = params.first;
        this.rest = frozen(params.rest);
        Object.freeze(this);
    }

    get specs(): ReadonlyArray<CompSpec> {
        return [this.first, ...this.rest];
    }

    scan(h: ScanHandler) {
        h.childArray('preLocals', this.preLocals);
        h.child('key', this.key);
        h.child('value', this.value);
        h.childArray('postLocals', this.postLocals);
        h.child('first', this.first);
        h.childArray('rest', this.rest);
    }
}

export type ObjBody = (MemberList | ObjComp);

//
// Compound expressions
//

// `assert cond : msg; returned`
export class AssertExpr extends BaseNode {
    readonly kind = 'AssertExpr';
    readonly offset: Offset;
    readonly assertion: AssertStmt;
    readonly returned: Expr;

    constructor(params: {offset: Offset, assertion: AssertStmt,
                         returned: Expr})
    {
        super();
        this.offset = params.offset;
        this.assertion = params.assertion;
        this.returned = params.returned;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('assertion', this.assertion);
        h.child('returned', this.returned);
    }
}

export class LocalExpr extends BaseNode {
    readonly kind = 'LocalExpr';
    readonly offset: Offset;
    /* [NonEmpty] */
    readonly bindings: ReadonlyArray<Bind>;
    readonly returned: Expr;

    constructor(params: {offset: Offset, bindings: ReadonlyArray<Bind>,
                         returned: Expr})
    {
        super();
        this.offset = params.offset;
        this.bindings = frozen(params.bindings);
        this.returned = params.returned;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.childArray('bindings', this.bindings);
        h.child('returned', this.returned);
    }
}

export class Import extends BaseNode {
    readonly kind = 'Import';
    readonly offset: Offset;
    readonly path: string;

    constructor(params: {offset: Offset, path: string}) {
        super();
        this.offset = params.offset;
        this.path = params.path;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('path', this.path);
    }
}

export class ImportStr extends BaseNode {
    readonly kind = 'ImportStr';
    readonly offset: Offset;
    readonly path: string;

    constructor(params: {offset: Offset, path: string}) {
        super();
        this.offset = params.offset;
        this.path = params.path;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('path', this.path);
    }
}

// `error message`
export class ErrorExpr extends BaseNode {
    readonly kind = 'Error';
    readonly offset: Offset;
    readonly message: Expr;

    constructor(params: {offset: Offset, message: Expr}) {
        super();
        this.offset = params.offset;
        this.message = params.message;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('message', this.message);
    }
}

export class Apply extends BaseNode {
    readonly kind = 'Apply';
    readonly offset: Offset;
    readonly target: Expr;
    readonly args: Args;

    constructor(params: {offset: Offset, target: Expr, args: Args}) {
        super();
        this.offset = params.offset;
        this.target = params.target;
        this.args = params.args;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('target', this.target);
        h.child('args', this.args);
    }
}

// `target.name`
export class Select extends BaseNode {
    readonly kind = 'Select';
    readonly offset: Offset;
    readonly target: Expr;
    readonly name: string;

    constructor(params: {offset: Offset, target: Expr, name: string}) {
        super();
        this.offset = params.offset;
        this.target = params.target;
        this.name = params.name;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('target', this.target);
        h.field('name', this.name);
    }
}

// `target[index]`
export class Lookup extends BaseNode {
    readonly kind = 'Lookup';
    readonly offset: Offset;
    readonly target: Expr;
    readonly index: Expr;

    constructor(params: {offset: Offset, target: Expr, index: Expr}) {
        super();
        this.offset = params.offset;
        this.target = params.target;
        this.index = params.index;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('target', this.target);
        h.child('index', this.index);
    }
}

// `target[start:end:stride]`, any part may be omitted.
export class Slice extends BaseNode {
    readonly kind = 'Slice';
    readonly offset: Offset;
    readonly target: Expr;
    readonly start: Expr | null;
    readonly end: Expr | null;
    readonly stride: Expr | null;

    constructor(params: {offset: Offset, target: Expr, start: Expr | null,
                         end: Expr | null, stride: Expr | null})
    {
        super();
        this.offset = params.offset;
        this.target = params.target;
        this.start = params.start;
        this.end = params.end;
        this.stride = params.stride;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('target', this.target);
        h.child('start', this.start);
        h.child('end', this.end);
        h.child('stride', this.stride);
    }
}

export class FunctionExpr extends BaseNode {
    readonly kind = 'Function';
    readonly offset: Offset;
    readonly params: Params;
    readonly body: Expr;

    constructor(params: {offset: Offset, params: Params, body: Expr}) {
        super();
        this.offset = params.offset;
        this.params = params.params;
        this.body = params.body;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('params', this.params);
        h.child('body', this.body);
    }
}

export class IfElse extends BaseNode {
    readonly kind = 'IfElse';
    readonly offset: Offset;
    readonly cond: Expr;
    readonly consequent: Expr;
    readonly alternate: Expr | null;

    constructor(params: {offset: Offset, cond: Expr, consequent: Expr,
                         alternate: Expr | null})
    {
        super();
        this.offset = params.offset;
        this.cond = params.cond;
        this.consequent = params.consequent;
        this.alternate = params.alternate;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('cond', this.cond);
        h.child('consequent', this.consequent);
        h.child('alternate', this.alternate);
    }
}

//
// Comprehensions
//

export class IfSpec extends BaseNode {
    readonly kind = 'IfSpec';
    readonly offset: Offset;
    readonly cond: Expr;

    constructor(params: {offset: Offset, cond: Expr}) {
        super();
        this.offset = params.offset;
        this.cond = params.cond;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('cond', this.cond);
    }
}

// `for x in iterable`, binding `slot` to each element in turn.
export class ForSpec extends BaseNode {
    readonly kind = 'ForSpec';
    readonly offset: Offset;
    readonly slot: Slot;
    readonly iterable: Expr;

    constructor(params: {offset: Offset, slot: Slot, iterable: Expr}) {
        super();
        this.offset = params.offset;
        this.slot = checkSlot(params.slot, params.offset);
        this.iterable = params.iterable;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.field('slot', this.slot);
        h.child('iterable', this.iterable);
    }
}

export type CompSpec = (IfSpec | ForSpec);

// `[value for x in xs if cond ...]`
export class Comp extends BaseNode {
    readonly kind = 'Comp';
    readonly offset: Offset;
    readonly value: Expr;
    readonly first: ForSpec;
    readonly rest: ReadonlyArray<CompSpec>;

    constructor(params: {offset: Offset, value: Expr, first: ForSpec,
                         rest: ReadonlyArray<CompSpec>})
    {
        super();
        this.offset = params.offset;
        this.value = params.value;
        this.first = params.first;
        this.rest = frozen(params.rest);
        Object.freeze(this);
    }

    get specs(): ReadonlyArray<CompSpec> {
        return [this.first, ...this.rest];
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('value', this.value);
        h.child('first', this.first);
        h.childArray('rest', this.rest);
    }
}

// `base { ... }`
export class ObjExtend extends BaseNode {
    readonly kind = 'ObjExtend';
    readonly offset: Offset;
    readonly base: Expr;
    readonly ext: ObjBody;

    constructor(params: {offset: Offset, base: Expr, ext: ObjBody}) {
        super();
        this.offset = params.offset;
        this.base = params.base;
        this.ext = params.ext;
        Object.freeze(this);
    }

    scan(h: ScanHandler) {
        h.field('offset', this.offset);
        h.child('base', this.base);
        h.child('ext', this.ext);
    }
}

export type Literal =
    (Null    |
     True    |
     False   |
     Self    |
     Super   |
     Dollar  |
     Str     |
     Num);

export type Expr =
    (Literal      |
     Id           |
     Arr          |
     Obj          |
     Parened      |
     UnaryOp      |
     BinaryOp     |
     AssertExpr   |
     LocalExpr    |
     Import       |
     ImportStr    |
     ErrorExpr    |
     Apply        |
     Select       |
     Lookup       |
     Slice        |
     FunctionExpr |
     IfElse       |
     CompSpec     |
     Comp         |
     ObjExtend);

// Everything that can appear in a tree, expressions or not.
export type Node =
    (Expr      |
     Bind      |
     Param     |
     Params    |
     Arg       |
     Args      |
     FieldName |
     Member    |
     ObjBody);

export type ExprKind = Expr['kind'];
export type NodeKind = Node['kind'];

const EXPR_KINDS: ReadonlySet<string> = new Set<ExprKind>([
    'Null', 'True', 'False', 'Self', 'Super', '$', 'Str', 'Num', 'Id', 'Arr',
    'Obj', 'Parened', 'UnaryOp', 'BinaryOp', 'AssertExpr', 'LocalExpr',
    'Import', 'ImportStr', 'Error', 'Apply', 'Select', 'Lookup', 'Slice',
    'Function', 'IfElse', 'IfSpec', 'ForSpec', 'Comp', 'ObjExtend',
]);

export function isExpr(node: Node): node is Expr {
    return EXPR_KINDS.has(node.kind);
}

export function isCompSpec(node: Node): node is CompSpec {
    return node.kind === 'IfSpec' || node.kind === 'ForSpec';
}
