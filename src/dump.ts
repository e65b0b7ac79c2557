import * as S from './schema';
import { scanEntries } from './ast_util';
import { formatNumber } from './util';
import { SexprWriter, StringWriteStream } from './write_stream';

/**
 * The canonical text form of a tree, used by tests and the command line:
 *
 *     (LocalExpr 0 ((Bind 6 0 nil (Num 10 1))) (Id 13 0))
 *
 * Each node is `(Kind field ...)` with fields in declaration order. Absent
 * values are `nil`, strings are JSON literals and operators and
 * visibilities are bare atoms. `read_dump` reads it back.
 */
export function dump(node: S.Node): string {
    const out = new StringWriteStream();
    writeNode(new SexprWriter(out), node);
    return out.toString();
}

export function formatScalar(value: S.Scalar): string {
    if (value === null) {
        return 'nil';
    }
    if (typeof value === 'string') {
        return JSON.stringify(value);
    }
    if (typeof value === 'number') {
        return formatNumber(value);
    }
    return value ? 'true' : 'false';
}

export function writeNode(w: SexprWriter, node: S.Node): void {
    w.open(node.kind);
    for (const entry of scanEntries(node)) {
        switch (entry.type) {
            case 'child':
                if (entry.node === null) {
                    w.atom('nil');
                } else {
                    writeNode(w, entry.node);
                }
                break;
            case 'children':
                w.open();
                entry.nodes.forEach(child => writeNode(w, child));
                w.close();
                break;
            case 'field':
                w.atom(formatScalar(entry.value));
                break;
            case 'tag':
                w.atom(entry.value);
                break;
        }
    }
    w.close();
}

export type TaggedJson =
    (string | number | boolean | null |
     Array<TaggedJson> |
     {[key: string]: TaggedJson});

// `{"kind": ..., field: ...}`, for display. Not read back.
export function toTaggedJson(node: S.Node): {[key: string]: TaggedJson} {
    const result: {[key: string]: TaggedJson} = {kind: node.kind};
    for (const entry of scanEntries(node)) {
        switch (entry.type) {
            case 'child':
                result[entry.name] = entry.node === null ? null : toTaggedJson(entry.node);
                break;
            case 'children':
                result[entry.name] = entry.nodes.map(toTaggedJson);
                break;
            case 'field':
            case 'tag':
                result[entry.name] = entry.value;
                break;
        }
    }
    return result;
}
