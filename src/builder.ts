import * as S from './schema';
import { ConstructionError, ConstructionErrorKind } from './errors';
import { Memoizer } from './memoize';
import { Scope, SlotAllocator } from './scope';

/**
 * Builds slot-resolved trees for a parser.
 *
 * Constructs that introduce names take their sub-expressions as thunks, so
 * the names are declared before anything that may refer to them is built.
 * Everything else takes finished children.
 */

export interface ParamDecl {
    name: string;
    defaultExpr?: () => S.Expr;
}

export interface BindDecl {
    offset: S.Offset;
    name: string;
    // Present for `local f(params) = rhs`.
    params?: ReadonlyArray<ParamDecl>;
    rhs: () => S.Expr;
}

export interface ForSpecDecl {
    kind: 'for';
    offset: S.Offset;
    name: string;
    iterable: () => S.Expr;
}

export interface IfSpecDecl {
    kind: 'if';
    offset: S.Offset;
    cond: () => S.Expr;
}

export type CompSpecDecl = (ForSpecDecl | IfSpecDecl);

// A comprehension always starts with a `for`.
export type CompSpecDecls = readonly [ForSpecDecl, ...CompSpecDecl[]];

export interface FieldDecl {
    kind: 'field';
    offset: S.Offset;
    // A literal name, or the expression of `[expr]: ...`.
    name: string | (() => S.Expr);
    plus?: boolean;
    params?: ReadonlyArray<ParamDecl>;
    visibility?: S.Visibility;
    rhs: () => S.Expr;
}

export interface LocalMemberDecl extends BindDecl {
    kind: 'local';
}

export interface AssertMemberDecl {
    kind: 'assert';
    cond: () => S.Expr;
    message?: () => S.Expr;
}

export type MemberDecl = (FieldDecl | LocalMemberDecl | AssertMemberDecl);

export interface ObjCompDecl {
    preLocals?: ReadonlyArray<BindDecl>;
    key: () => S.Expr;
    value: () => S.Expr;
    postLocals?: ReadonlyArray<BindDecl>;
    specs: CompSpecDecls;
}

export interface ArgDecl {
    // Absent for positional arguments.
    name?: string;
    value: S.Expr;
}

export interface SliceParts {
    start?: S.Expr;
    end?: S.Expr;
    stride?: S.Expr;
}

export interface TreeBuilderOptions {
    // Names bound before the program starts, given slots 0..N-1 in order.
    globals?: Iterable<string>;
    // Shares identical subtrees as they are built.
    memoizer?: Memoizer;
}

export class TreeBuilder {
    readonly globals: ReadonlyMap<string, S.Slot>;
    private readonly slots: SlotAllocator;
    private readonly names: Map<S.Slot, string>;
    private readonly memoizer: Memoizer | null;
    private scope: Scope;

    constructor(options: TreeBuilderOptions = {}) {
        this.slots = new SlotAllocator();
        this.names = new Map();
        this.memoizer = options.memoizer ?? null;
        this.scope = new Scope(null);

        const globals = new Map<string, S.Slot>();
        for (const name of options.globals ?? []) {
            if (!globals.has(name)) {
                globals.set(name, this.declare(name));
            }
        }
        this.globals = globals;
    }

    // The name each slot was declared with.
    get slotNames(): ReadonlyMap<S.Slot, string> {
        return this.names;
    }

    // One more than the highest slot allocated so far.
    get frameSize(): number {
        return this.slots.size;
    }

    //
    // Leaves
    //

    null_(offset: S.Offset): S.Null {
        return this.intern(new S.Null({offset}));
    }

    true_(offset: S.Offset): S.True {
        return this.intern(new S.True({offset}));
    }

    false_(offset: S.Offset): S.False {
        return this.intern(new S.False({offset}));
    }

    self(offset: S.Offset): S.Self {
        return this.intern(new S.Self({offset}));
    }

    super_(offset: S.Offset): S.Super {
        return this.intern(new S.Super({offset}));
    }

    dollar(offset: S.Offset): S.Dollar {
        return this.intern(new S.Dollar({offset}));
    }

    str(offset: S.Offset, value: string): S.Str {
        return this.intern(new S.Str({offset, value}));
    }

    num(offset: S.Offset, value: number): S.Num {
        return this.intern(new S.Num({offset, value}));
    }

    id(offset: S.Offset, name: string): S.Id {
        const slot = this.scope.lookup(name);
        if (slot === undefined) {
            throw new ConstructionError(
                ConstructionErrorKind.UnresolvedIdentifier,
                `'${name}' is not defined`,
                offset);
        }
        return this.intern(new S.Id({offset, slot}));
    }

    import_(offset: S.Offset, path: string): S.Import {
        return this.intern(new S.Import({offset, path}));
    }

    importStr(offset: S.Offset, path: string): S.ImportStr {
        return this.intern(new S.ImportStr({offset, path}));
    }

    //
    // Compound expressions
    //

    arr(offset: S.Offset, elements: ReadonlyArray<S.Expr>): S.Arr {
        return this.intern(new S.Arr({offset, elements}));
    }

    parened(offset: S.Offset, inner: S.Expr): S.Parened {
        return this.intern(new S.Parened({offset, inner}));
    }

    unary(offset: S.Offset, op: S.UnaryOperator, operand: S.Expr): S.UnaryOp {
        return this.intern(new S.UnaryOp({offset, op, operand}));
    }

    binary(offset: S.Offset, lhs: S.Expr, op: S.BinaryOperator,
           rhs: S.Expr): S.BinaryOp
    {
        return this.intern(new S.BinaryOp({offset, lhs, op, rhs}));
    }

    assert(offset: S.Offset, condition: S.Expr, message: S.Expr | null,
           returned: S.Expr): S.AssertExpr
    {
        const assertion = this.intern(new S.AssertStmt({condition, message}));
        return this.intern(new S.AssertExpr({offset, assertion, returned}));
    }

    error(offset: S.Offset, message: S.Expr): S.ErrorExpr {
        return this.intern(new S.ErrorExpr({offset, message}));
    }

    apply(offset: S.Offset, target: S.Expr,
          args: ReadonlyArray<ArgDecl>): S.Apply
    {
        const entries = args.map(a => this.intern(new S.Arg({
            name: a.name ?? null,
            value: a.value,
        })));
        return this.intern(new S.Apply({
            offset,
            target,
            args: this.intern(new S.Args({entries})),
        }));
    }

    select(offset: S.Offset, target: S.Expr, name: string): S.Select {
        return this.intern(new S.Select({offset, target, name}));
    }

    lookup(offset: S.Offset, target: S.Expr, index: S.Expr): S.Lookup {
        return this.intern(new S.Lookup({offset, target, index}));
    }

    slice(offset: S.Offset, target: S.Expr, parts: SliceParts): S.Slice {
        return this.intern(new S.Slice({
            offset,
            target,
            start: parts.start ?? null,
            end: parts.end ?? null,
            stride: parts.stride ?? null,
        }));
    }

    ifElse(offset: S.Offset, cond: S.Expr, consequent: S.Expr,
           alternate: S.Expr | null = null): S.IfElse
    {
        return this.intern(new S.IfElse({offset, cond, consequent, alternate}));
    }

    //
    // Scoping constructs
    //

    // `local a = ..., b = ...; body`. The bindings see each other.
    local(offset: S.Offset, binds: ReadonlyArray<BindDecl>,
          body: () => S.Expr): S.LocalExpr
    {
        this.checkUnique(binds, ConstructionErrorKind.DuplicateLocalName);
        return this.withScope(binds.map(b => b.name), slots => {
            const bindings = binds.map((b, i) => this.bind(b, slots[i]));
            return this.intern(new S.LocalExpr({
                offset,
                bindings,
                returned: body(),
            }));
        });
    }

    func(offset: S.Offset, params: ReadonlyArray<ParamDecl>,
         body: () => S.Expr): S.FunctionExpr
    {
        const [built, returned] = this.withParams(offset, params, body);
        return this.intern(new S.FunctionExpr({
            offset,
            params: built,
            body: returned,
        }));
    }

    // `[value for x in xs if cond ...]`
    comp(offset: S.Offset, value: () => S.Expr, specs: CompSpecDecls): S.Comp {
        return this.withSpecs(specs, (first, rest) => this.intern(new S.Comp({
            offset,
            value: value(),
            first,
            rest,
        })));
    }

    obj(offset: S.Offset, members: ReadonlyArray<MemberDecl>): S.Obj {
        return this.intern(new S.Obj({offset, body: this.memberList(members)}));
    }

    objComp(offset: S.Offset, decl: ObjCompDecl): S.Obj {
        return this.intern(new S.Obj({offset, body: this.objCompBody(decl)}));
    }

    // `base { members }`
    extend(offset: S.Offset, base: S.Expr,
           members: ReadonlyArray<MemberDecl>): S.ObjExtend
    {
        return this.intern(new S.ObjExtend({
            offset,
            base,
            ext: this.memberList(members),
        }));
    }

    extendComp(offset: S.Offset, base: S.Expr, decl: ObjCompDecl): S.ObjExtend {
        return this.intern(new S.ObjExtend({
            offset,
            base,
            ext: this.objCompBody(decl),
        }));
    }

    //
    // Internals
    //

    private intern<T extends S.Node>(node: T): T {
        return this.memoizer === null ? node : this.memoizer.memo(node);
    }

    private declare(name: string): S.Slot {
        const slot = this.slots.allocate();
        this.scope.declare(name, slot);
        this.names.set(slot, name);
        return slot;
    }

    private withScope<T>(names: ReadonlyArray<string>,
                         f: (slots: S.Slot[]) => T): T
    {
        const outer = this.scope;
        this.scope = new Scope(outer);
        try {
            return f(names.map(name => this.declare(name)));
        } finally {
            this.scope = outer;
        }
    }

    private checkUnique(decls: ReadonlyArray<{offset: S.Offset, name: string}>,
                        kind: ConstructionErrorKind): void
    {
        const seen = new Set<string>();
        for (const decl of decls) {
            if (seen.has(decl.name)) {
                throw new ConstructionError(
                    kind, `'${decl.name}' is declared more than once`, decl.offset);
            }
            seen.add(decl.name);
        }
    }

    private bind(decl: BindDecl, slot: S.Slot): S.Bind {
        if (decl.params === undefined) {
            return this.intern(new S.Bind({
                offset: decl.offset,
                slot,
                params: null,
                rhs: decl.rhs(),
            }));
        }
        const [params, rhs] = this.withParams(decl.offset, decl.params, decl.rhs);
        return this.intern(new S.Bind({offset: decl.offset, slot, params, rhs}));
    }

    // All parameters are in scope for every default and for the body.
    private withParams(offset: S.Offset, decls: ReadonlyArray<ParamDecl>,
                       body: () => S.Expr): [S.Params, S.Expr]
    {
        this.checkUnique(decls.map(d => ({offset, name: d.name})),
                         ConstructionErrorKind.DuplicateParameterName);
        return this.withScope<[S.Params, S.Expr]>(decls.map(d => d.name), slots => {
            const entries = decls.map((d, i) => this.intern(new S.Param({
                name: d.name,
                defaultExpr: d.defaultExpr === undefined ? null : d.defaultExpr(),
                slot: slots[i],
            })));
            const params = this.intern(new S.Params({entries}));
            return [params, body()];
        });
    }

    private withSpecs<T>(specs: CompSpecDecls,
                         f: (first: S.ForSpec, rest: S.CompSpec[]) => T): T
    {
        const [firstDecl, ...restDecls] = specs;
        const iterable = firstDecl.iterable();
        return this.withScope([firstDecl.name], ([slot]) => {
            const first = this.intern(new S.ForSpec({
                offset: firstDecl.offset,
                slot,
                iterable,
            }));
            return this.withRestSpecs(restDecls, [], rest => f(first, rest));
        });
    }

    // Each `for` sees the loop variables of the specs before it.
    private withRestSpecs<T>(decls: ReadonlyArray<CompSpecDecl>,
                             built: S.CompSpec[],
                             f: (rest: S.CompSpec[]) => T): T
    {
        if (decls.length === 0) {
            return f(built);
        }
        const [decl, ...remaining] = decls;
        if (decl.kind === 'if') {
            const spec = this.intern(new S.IfSpec({
                offset: decl.offset,
                cond: decl.cond(),
            }));
            return this.withRestSpecs(remaining, [...built, spec], f);
        }
        const iterable = decl.iterable();
        return this.withScope([decl.name], ([slot]) => {
            const spec = this.intern(new S.ForSpec({
                offset: decl.offset,
                slot,
                iterable,
            }));
            return this.withRestSpecs(remaining, [...built, spec], f);
        });
    }

    private fieldName(name: string | (() => S.Expr)): S.FieldName {
        if (typeof name === 'string') {
            return this.intern(new S.Fixed({value: name}));
        }
        return this.intern(new S.Dyn({expr: name()}));
    }

    // Object locals see each other; computed field names do not see them.
    private memberList(members: ReadonlyArray<MemberDecl>): S.MemberList {
        const locals: LocalMemberDecl[] = [];
        for (const m of members) {
            if (m.kind === 'local') {
                locals.push(m);
            }
        }
        this.checkUnique(locals, ConstructionErrorKind.DuplicateLocalName);

        const pending = members.map(m => this.pendingMember(m));
        return this.withScope(locals.map(l => l.name), slots => {
            let next = 0;
            const built = pending.map(finish => finish(() => slots[next++]));
            return this.intern(new S.MemberList({members: built}));
        });
    }

    // Builds what lies outside the object scope now, the rest on demand.
    private pendingMember(m: MemberDecl): (nextLocalSlot: () => S.Slot) => S.Member {
        switch (m.kind) {
            case 'field': {
                const decl: FieldDecl = m;
                const fieldName = this.fieldName(decl.name);
                return () => this.field(decl, fieldName);
            }
            case 'local': {
                const decl: LocalMemberDecl = m;
                return nextLocalSlot => this.intern(new S.BindStmt({
                    value: this.bind(decl, nextLocalSlot()),
                }));
            }
            case 'assert': {
                const decl: AssertMemberDecl = m;
                return () => this.intern(new S.AssertStmt({
                    condition: decl.cond(),
                    message: decl.message === undefined ? null : decl.message(),
                }));
            }
        }
    }

    private field(m: FieldDecl, fieldName: S.FieldName): S.Field {
        const plus = m.plus ?? false;
        const visibility = m.visibility ?? S.Visibility.Normal;
        if (m.params === undefined) {
            return this.intern(new S.Field({
                offset: m.offset,
                fieldName,
                plus,
                params: null,
                visibility,
                rhs: m.rhs(),
            }));
        }
        const [params, rhs] = this.withParams(m.offset, m.params, m.rhs);
        return this.intern(new S.Field({
            offset: m.offset,
            fieldName,
            plus,
            params,
            visibility,
            rhs,
        }));
    }

    // Loop variables are seen by everything; the key also sees the locals
    // before it, the value and the locals see all of them.
    private objCompBody(decl: ObjCompDecl): S.ObjComp {
        const pre = decl.preLocals ?? [];
        const post = decl.postLocals ?? [];
        this.checkUnique([...pre, ...post], ConstructionErrorKind.DuplicateLocalName);
        return this.withSpecs(decl.specs, (first, rest) =>
            this.withScope(pre.map(b => b.name), preSlots => {
                const key = decl.key();
                return this.withScope(post.map(b => b.name), postSlots => {
                    const preLocals = pre.map((b, i) => this.intern(new S.BindStmt({
                        value: this.bind(b, preSlots[i]),
                    })));
                    const value = decl.value();
                    const postLocals = post.map((b, i) => this.intern(new S.BindStmt({
                        value: this.bind(b, postSlots[i]),
                    })));
                    return this.intern(new S.ObjComp({
                        preLocals,
                        key,
                        value,
                        postLocals,
                        first,
                        rest,
                    }));
                });
            }));
    }
}
