import * as S from './schema';
import { ExprVisitor, MemberVisitor, visitExpr, visitMember } from './visitor';
import { formatNumber, isIdentifier } from './util';

// Binding strength of binary operators; lower binds tighter.
const BINARY_PRECEDENCE: {[op in S.BinaryOperator]: number} = {
    [S.BinaryOperator.Mul]: 5,
    [S.BinaryOperator.Div]: 5,
    [S.BinaryOperator.Mod]: 5,
    [S.BinaryOperator.Add]: 6,
    [S.BinaryOperator.Sub]: 6,
    [S.BinaryOperator.Shl]: 7,
    [S.BinaryOperator.Shr]: 7,
    [S.BinaryOperator.Less]: 8,
    [S.BinaryOperator.Greater]: 8,
    [S.BinaryOperator.LessEqual]: 8,
    [S.BinaryOperator.GreaterEqual]: 8,
    [S.BinaryOperator.In]: 8,
    [S.BinaryOperator.Equal]: 9,
    [S.BinaryOperator.NotEqual]: 9,
    [S.BinaryOperator.BitAnd]: 10,
    [S.BinaryOperator.BitXor]: 11,
    [S.BinaryOperator.BitOr]: 12,
    [S.BinaryOperator.LogicalAnd]: 13,
    [S.BinaryOperator.LogicalOr]: 14,
};

const PRIMARY = 0;
const UNARY = 3;
// Forms that extend as far right as possible: local, if, function, ...
const OPEN = 16;
const ANY = Infinity;

const SEPARATORS: {[v in S.Visibility]: string} = {
    [S.Visibility.Normal]: ':',
    [S.Visibility.Hidden]: '::',
    [S.Visibility.Unhide]: ':::',
};

const OPERATOR_CHARS = '!$:~+-&|^=<>*/%';

function precedence(e: S.Expr): number {
    switch (e.kind) {
        case 'BinaryOp':
            return BINARY_PRECEDENCE[e.op];
        case 'UnaryOp':
            return UNARY;
        case 'Num':
            return formatNumber(e.value).startsWith('-') ? UNARY : PRIMARY;
        case 'LocalExpr':
        case 'IfElse':
        case 'Function':
        case 'AssertExpr':
        case 'Error':
        case 'Import':
        case 'ImportStr':
            return OPEN;
        default:
            return PRIMARY;
    }
}

export interface UnparseOptions {
    // Names to print for slots; others print as `_<slot>`.
    slotNames?: ReadonlyMap<S.Slot, string>;
}

/**
 * Prints a tree as source text. Explicit parentheses come from `Parened`
 * nodes; others are added only where the tree shape needs them.
 */
export function unparse(e: S.Expr, options: UnparseOptions = {}): string {
    return new Unparser(options).render(e, ANY);
}

class Unparser implements ExprVisitor<string>, MemberVisitor<string> {
    private readonly slotNames: ReadonlyMap<S.Slot, string>;

    constructor(options: UnparseOptions) {
        this.slotNames = options.slotNames ?? new Map();
    }

    render(e: S.Expr, limit: number): string {
        const text = visitExpr(e, this);
        return precedence(e) > limit ? `(${text})` : text;
    }

    private name(slot: S.Slot): string {
        return this.slotNames.get(slot) ?? `_${slot}`;
    }

    private params(params: S.Params): string {
        return params.entries.map(p => p.defaultExpr === null
            ? p.name
            : `${p.name}=${this.render(p.defaultExpr, ANY)}`).join(', ');
    }

    private bind(b: S.Bind): string {
        const params = b.params === null ? '' : `(${this.params(b.params)})`;
        return `${this.name(b.slot)}${params} = ${this.render(b.rhs, ANY)}`;
    }

    private fieldName(name: S.FieldName): string {
        if (name.kind === 'Dyn') {
            return `[${this.render(name.expr, ANY)}]`;
        }
        return isIdentifier(name.value) ? name.value : JSON.stringify(name.value);
    }

    private specs(specs: ReadonlyArray<S.CompSpec>): string {
        return specs.map(s => visitExpr(s, this)).join(' ');
    }

    private body(body: S.ObjBody): string {
        if (body.kind === 'MemberList') {
            if (body.members.length === 0) {
                return '{}';
            }
            return `{${body.members.map(m => visitMember(m, this)).join(', ')}}`;
        }
        const parts = [
            ...body.preLocals.map(m => this.visitBindStmt(m)),
            `[${this.render(body.key, ANY)}]: ${this.render(body.value, ANY)}`,
            ...body.postLocals.map(m => this.visitBindStmt(m)),
        ];
        return `{${parts.join(', ')} ${this.specs(body.specs)}}`;
    }

    visitField(node: S.Field): string {
        const params = node.params === null ? '' : `(${this.params(node.params)})`;
        const plus = node.plus ? '+' : '';
        return `${this.fieldName(node.fieldName)}${params}${plus}` +
            `${SEPARATORS[node.visibility]} ${this.render(node.rhs, ANY)}`;
    }

    visitBindStmt(node: S.BindStmt): string {
        return `local ${this.bind(node.value)}`;
    }

    visitAssertStmt(node: S.AssertStmt): string {
        const message = node.message === null
            ? ''
            : ` : ${this.render(node.message, ANY)}`;
        return `assert ${this.render(node.condition, ANY)}${message}`;
    }

    visitNull(_node: S.Null): string { return 'null'; }
    visitTrue(_node: S.True): string { return 'true'; }
    visitFalse(_node: S.False): string { return 'false'; }
    visitSelf(_node: S.Self): string { return 'self'; }
    visitSuper(_node: S.Super): string { return 'super'; }
    visitDollar(_node: S.Dollar): string { return '$'; }

    visitStr(node: S.Str): string {
        return JSON.stringify(node.value);
    }

    visitNum(node: S.Num): string {
        if (!Number.isFinite(node.value)) {
            throw new Error(`${formatNumber(node.value)} at offset ${node.offset} has no source form`);
        }
        return formatNumber(node.value);
    }

    visitId(node: S.Id): string {
        return this.name(node.slot);
    }

    visitArr(node: S.Arr): string {
        return `[${node.elements.map(e => this.render(e, ANY)).join(', ')}]`;
    }

    visitObj(node: S.Obj): string {
        return this.body(node.body);
    }

    visitParened(node: S.Parened): string {
        return `(${this.render(node.inner, ANY)})`;
    }

    visitUnaryOp(node: S.UnaryOp): string {
        const operand = this.render(node.operand, UNARY);
        // `- -x`, not the single operator token `--`.
        const space = OPERATOR_CHARS.includes(operand[0]) ? ' ' : '';
        return `${node.op}${space}${operand}`;
    }

    visitBinaryOp(node: S.BinaryOp): string {
        const p = BINARY_PRECEDENCE[node.op];
        return `${this.render(node.lhs, p)} ${node.op} ${this.render(node.rhs, p - 1)}`;
    }

    visitAssertExpr(node: S.AssertExpr): string {
        return `${this.visitAssertStmt(node.assertion)}; ${this.render(node.returned, ANY)}`;
    }

    visitLocalExpr(node: S.LocalExpr): string {
        const binds = node.bindings.map(b => this.bind(b)).join(', ');
        return `local ${binds}; ${this.render(node.returned, ANY)}`;
    }

    visitImport(node: S.Import): string {
        return `import ${JSON.stringify(node.path)}`;
    }

    visitImportStr(node: S.ImportStr): string {
        return `importstr ${JSON.stringify(node.path)}`;
    }

    visitError(node: S.ErrorExpr): string {
        return `error ${this.render(node.message, ANY)}`;
    }

    visitApply(node: S.Apply): string {
        const args = node.args.entries.map(a => a.name === null
            ? this.render(a.value, ANY)
            : `${a.name}=${this.render(a.value, ANY)}`);
        return `${this.render(node.target, PRIMARY)}(${args.join(', ')})`;
    }

    visitSelect(node: S.Select): string {
        // `2.x` would lex as a malformed number.
        const target = node.target.kind === 'Num'
            ? `(${this.visitNum(node.target)})`
            : this.render(node.target, PRIMARY);
        return isIdentifier(node.name)
            ? `${target}.${node.name}`
            : `${target}[${JSON.stringify(node.name)}]`;
    }

    visitLookup(node: S.Lookup): string {
        return `${this.render(node.target, PRIMARY)}[${this.render(node.index, ANY)}]`;
    }

    visitSlice(node: S.Slice): string {
        const part = (e: S.Expr | null) => e === null ? '' : this.render(e, ANY);
        const stride = node.stride === null ? '' : `:${part(node.stride)}`;
        return `${this.render(node.target, PRIMARY)}` +
            `[${part(node.start)}:${part(node.end)}${stride}]`;
    }

    visitFunction(node: S.FunctionExpr): string {
        return `function(${this.params(node.params)}) ${this.render(node.body, ANY)}`;
    }

    visitIfElse(node: S.IfElse): string {
        const cond = this.render(node.cond, ANY);
        if (node.alternate === null) {
            return `if ${cond} then ${this.render(node.consequent, ANY)}`;
        }
        // An open-ended `then` branch would swallow the `else`.
        return `if ${cond} then ${this.render(node.consequent, OPEN - 1)}` +
            ` else ${this.render(node.alternate, ANY)}`;
    }

    visitIfSpec(node: S.IfSpec): string {
        return `if ${this.render(node.cond, ANY)}`;
    }

    visitForSpec(node: S.ForSpec): string {
        return `for ${this.name(node.slot)} in ${this.render(node.iterable, ANY)}`;
    }

    visitComp(node: S.Comp): string {
        return `[${this.render(node.value, ANY)} ${this.specs(node.specs)}]`;
    }

    visitObjExtend(node: S.ObjExtend): string {
        return `${this.render(node.base, PRIMARY)} ${this.body(node.ext)}`;
    }
}
