import * as S from './schema';

/**
 * One method per expression variant. Adding a variant to `S.Expr` breaks
 * every implementation until it handles the new case.
 */
export interface ExprVisitor<R> {
    visitNull(node: S.Null): R;
    visitTrue(node: S.True): R;
    visitFalse(node: S.False): R;
    visitSelf(node: S.Self): R;
    visitSuper(node: S.Super): R;
    visitDollar(node: S.Dollar): R;
    visitStr(node: S.Str): R;
    visitNum(node: S.Num): R;
    visitId(node: S.Id): R;
    visitArr(node: S.Arr): R;
    visitObj(node: S.Obj): R;
    visitParened(node: S.Parened): R;
    visitUnaryOp(node: S.UnaryOp): R;
    visitBinaryOp(node: S.BinaryOp): R;
    visitAssertExpr(node: S.AssertExpr): R;
    visitLocalExpr(node: S.LocalExpr): R;
    visitImport(node: S.Import): R;
    visitImportStr(node: S.ImportStr): R;
    visitError(node: S.ErrorExpr): R;
    visitApply(node: S.Apply): R;
    visitSelect(node: S.Select): R;
    visitLookup(node: S.Lookup): R;
    visitSlice(node: S.Slice): R;
    visitFunction(node: S.FunctionExpr): R;
    visitIfElse(node: S.IfElse): R;
    visitIfSpec(node: S.IfSpec): R;
    visitForSpec(node: S.ForSpec): R;
    visitComp(node: S.Comp): R;
    visitObjExtend(node: S.ObjExtend): R;
}

export interface MemberVisitor<R> {
    visitField(node: S.Field): R;
    visitBindStmt(node: S.BindStmt): R;
    visitAssertStmt(node: S.AssertStmt): R;
}

export function assertNever(x: never): never {
    throw new Error(`unhandled node: ${JSON.stringify(x)}`);
}

export function visitExpr<R>(node: S.Expr, v: ExprVisitor<R>): R {
    switch (node.kind) {
        case 'Null': return v.visitNull(node);
        case 'True': return v.visitTrue(node);
        case 'False': return v.visitFalse(node);
        case 'Self': return v.visitSelf(node);
        case 'Super': return v.visitSuper(node);
        case '$': return v.visitDollar(node);
        case 'Str': return v.visitStr(node);
        case 'Num': return v.visitNum(node);
        case 'Id': return v.visitId(node);
        case 'Arr': return v.visitArr(node);
        case 'Obj': return v.visitObj(node);
        case 'Parened': return v.visitParened(node);
        case 'UnaryOp': return v.visitUnaryOp(node);
        case 'BinaryOp': return v.visitBinaryOp(node);
        case 'AssertExpr': return v.visitAssertExpr(node);
        case 'LocalExpr': return v.visitLocalExpr(node);
        case 'Import': return v.visitImport(node);
        case 'ImportStr': return v.visitImportStr(node);
        case 'Error': return v.visitError(node);
        case 'Apply': return v.visitApply(node);
        case 'Select': return v.visitSelect(node);
        case 'Lookup': return v.visitLookup(node);
        case 'Slice': return v.visitSlice(node);
        case 'Function': return v.visitFunction(node);
        case 'IfElse': return v.visitIfElse(node);
        case 'IfSpec': return v.visitIfSpec(node);
        case 'ForSpec': return v.visitForSpec(node);
        case 'Comp': return v.visitComp(node);
        case 'ObjExtend': return v.visitObjExtend(node);
        default: return assertNever(node);
    }
}

export function visitMember<R>(node: S.Member, v: MemberVisitor<R>): R {
    switch (node.kind) {
        case 'Field': return v.visitField(node);
        case 'BindStmt': return v.visitBindStmt(node);
        case 'AssertStmt': return v.visitAssertStmt(node);
        default: return assertNever(node);
    }
}
