import * as S from './schema';
import { ConstructionError, ConstructionErrorKind } from './errors';
import { childNodes } from './ast_util';
import { preOrder } from './tree_iterator';

function sorted(slots: Iterable<S.Slot>): S.Slot[] {
    return Array.from(new Set(slots)).sort((a, b) => a - b);
}

// Slots a node binds itself, if any.
function ownBinding(node: S.Node): S.Slot | null {
    switch (node.kind) {
        case 'Bind':
        case 'Param':
        case 'ForSpec':
            return node.slot;
        default:
            return null;
    }
}

// Slots introduced anywhere under `root`, ascending.
export function boundSlots(root: S.Node): S.Slot[] {
    const result: S.Slot[] = [];
    for (const node of preOrder(root)) {
        const slot = ownBinding(node);
        if (slot !== null) {
            result.push(slot);
        }
    }
    return sorted(result);
}

// Slots read by identifiers under `root`, ascending.
export function referencedSlots(root: S.Node): S.Slot[] {
    const result: S.Slot[] = [];
    for (const node of preOrder(root)) {
        if (node.kind === 'Id') {
            result.push(node.slot);
        }
    }
    return sorted(result);
}

/**
 * Slots referenced under `root` but bound outside it: what a closure over
 * `root` has to capture. Relies on slots never being reused within a
 * source unit.
 */
export function freeSlots(root: S.Node): S.Slot[] {
    const bound = new Set(boundSlots(root));
    return referencedSlots(root).filter(slot => !bound.has(slot));
}

// Length of a slot-indexed frame array that can hold every slot in `root`.
export function frameSize(root: S.Node): number {
    let max = -1;
    for (const node of preOrder(root)) {
        const slot = node.kind === 'Id' ? node.slot : ownBinding(node);
        if (slot !== null && slot > max) {
            max = slot;
        }
    }
    return max + 1;
}

export function countNodes(root: S.Node): number {
    let n = 0;
    for (const _node of preOrder(root)) {
        n++;
    }
    return n;
}

export interface VerifyOptions {
    // Slots bound before the program starts.
    globalSlots?: Iterable<S.Slot>;
}

/**
 * Checks that every identifier under `root` refers to a binding whose
 * scope encloses it, and that no slot is bound twice. Trees from the
 * builder always pass; this is for trees that arrive some other way.
 */
export function verifySlots(root: S.Node, options: VerifyOptions = {}): void {
    const globals = new Set(options.globalSlots ?? []);
    new SlotVerifier(globals).check(root, globals);
}

class SlotVerifier {
    private readonly declared: Set<S.Slot>;

    constructor(globals: ReadonlySet<S.Slot>) {
        this.declared = new Set(globals);
    }

    check(node: S.Node, scope: ReadonlySet<S.Slot>): void {
        switch (node.kind) {
            case 'Id':
                if (!scope.has(node.slot)) {
                    throw new ConstructionError(
                        ConstructionErrorKind.UnresolvedIdentifier,
                        `slot ${node.slot} is not bound here`,
                        node.offset);
                }
                return;
            case 'LocalExpr': {
                const inner = this.extend(scope, node.bindings.map(b => b.slot), node.offset);
                node.bindings.forEach(b => this.checkBind(b, inner));
                this.check(node.returned, inner);
                return;
            }
            case 'Bind':
                this.checkBind(node, scope);
                return;
            case 'Function':
                this.checkParams(node.params, node.body, scope, node.offset);
                return;
            case 'Comp': {
                const inner = this.checkSpecs(node.specs, scope);
                this.check(node.value, inner);
                return;
            }
            case 'MemberList':
                this.checkMembers(node, scope);
                return;
            case 'ObjComp':
                this.checkObjComp(node, scope);
                return;
            default:
                childNodes(node).forEach(child => this.check(child, scope));
                return;
        }
    }

    private extend(scope: ReadonlySet<S.Slot>, slots: ReadonlyArray<S.Slot>,
                   offset: S.Offset | null): Set<S.Slot>
    {
        const result = new Set(scope);
        for (const slot of slots) {
            if (this.declared.has(slot)) {
                throw new ConstructionError(
                    ConstructionErrorKind.DuplicateSlotBinding,
                    `slot ${slot} is bound more than once`,
                    offset);
            }
            this.declared.add(slot);
            result.add(slot);
        }
        return result;
    }

    private checkBind(bind: S.Bind, scope: ReadonlySet<S.Slot>): void {
        if (bind.params === null) {
            this.check(bind.rhs, scope);
        } else {
            this.checkParams(bind.params, bind.rhs, scope, bind.offset);
        }
    }

    // Defaults see every parameter of their list.
    private checkParams(params: S.Params, body: S.Expr,
                        scope: ReadonlySet<S.Slot>, offset: S.Offset): void
    {
        const inner = this.extend(scope, Array.from(params.allSlots), offset);
        for (const [, defaultExpr] of params.defaultedSlots) {
            this.check(defaultExpr, inner);
        }
        this.check(body, inner);
    }

    private checkSpecs(specs: ReadonlyArray<S.CompSpec>,
                       scope: ReadonlySet<S.Slot>): ReadonlySet<S.Slot>
    {
        let current = scope;
        for (const spec of specs) {
            if (spec.kind === 'ForSpec') {
                this.check(spec.iterable, current);
                current = this.extend(current, [spec.slot], spec.offset);
            } else {
                this.check(spec.cond, current);
            }
        }
        return current;
    }

    private checkMembers(body: S.MemberList, scope: ReadonlySet<S.Slot>): void {
        for (const field of body.fields) {
            if (field.fieldName.kind === 'Dyn') {
                this.check(field.fieldName.expr, scope);
            }
        }
        const inner = this.extend(scope, body.binds.map(b => b.value.slot), null);
        for (const member of body.members) {
            switch (member.kind) {
                case 'Field':
                    if (member.params === null) {
                        this.check(member.rhs, inner);
                    } else {
                        this.checkParams(member.params, member.rhs, inner, member.offset);
                    }
                    break;
                case 'BindStmt':
                    this.checkBind(member.value, inner);
                    break;
                case 'AssertStmt':
                    this.check(member.condition, inner);
                    if (member.message !== null) {
                        this.check(member.message, inner);
                    }
                    break;
            }
        }
    }

    private checkObjComp(body: S.ObjComp, scope: ReadonlySet<S.Slot>): void {
        const loop = this.checkSpecs(body.specs, scope);
        const withPre = this.extend(loop, body.preLocals.map(b => b.value.slot), null);
        this.check(body.key, withPre);
        const withAll = this.extend(withPre, body.postLocals.map(b => b.value.slot), null);
        body.preLocals.forEach(b => this.checkBind(b.value, withAll));
        this.check(body.value, withAll);
        body.postLocals.forEach(b => this.checkBind(b.value, withAll));
    }
}
