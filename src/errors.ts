export enum ConstructionErrorKind {
    DuplicateParameterName = "DuplicateParameterName",
    DuplicateParameterSlot = "DuplicateParameterSlot",
    InvalidSlot = "InvalidSlot",
    UnresolvedIdentifier = "UnresolvedIdentifier",
    DuplicateStaticFieldName = "DuplicateStaticFieldName",
    DuplicateLocalName = "DuplicateLocalName",
    DuplicateSlotBinding = "DuplicateSlotBinding"
};

// Raised while a tree is being built; the offending node is never returned.
export class ConstructionError extends Error {
    readonly kind: ConstructionErrorKind;
    // Source offset of the construct being built, when it is known.
    readonly offset: number | null;
    readonly detail: string;

    constructor(kind: ConstructionErrorKind, detail: string,
                offset: number | null = null)
    {
        super(offset === null
            ? `${kind}: ${detail}`
            : `${kind} at offset ${offset}: ${detail}`);
        this.name = 'ConstructionError';
        this.kind = kind;
        this.offset = offset;
        this.detail = detail;
    }
}

export class DumpSyntaxError extends Error {
    // Character position in the dump text.
    readonly position: number;

    constructor(message: string, position: number) {
        super(`${message} at position ${position}`);
        this.name = 'DumpSyntaxError';
        this.position = position;
    }
}
