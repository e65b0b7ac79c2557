import * as S from './schema';

export type ScanEntry =
    ({type: 'child', name: string, node: S.Node | null} |
     {type: 'children', name: string, nodes: ReadonlyArray<S.Node>} |
     {type: 'field', name: string, value: S.Scalar} |
     {type: 'tag', name: string, value: string});

// Lists the fields of `node` in the order its `scan` reports them.
export function scanEntries(node: S.Node): ScanEntry[] {
    const entries: ScanEntry[] = [];
    node.scan({
        child(name: string, child: S.Node | null) {
            entries.push({type: 'child', name, node: child});
        },
        childArray(name: string, nodes: ReadonlyArray<S.Node>) {
            entries.push({type: 'children', name, nodes});
        },
        field(name: string, value: S.Scalar) {
            entries.push({type: 'field', name, value});
        },
        tag(name: string, value: string) {
            entries.push({type: 'tag', name, value});
        },
    });
    return entries;
}

// The direct children of `node`, array children flattened in place.
export function childNodes(node: S.Node): S.Node[] {
    const result: S.Node[] = [];
    for (const entry of scanEntries(node)) {
        if (entry.type === 'child' && entry.node !== null) {
            result.push(entry.node);
        } else if (entry.type === 'children') {
            result.push(...entry.nodes);
        }
    }
    return result;
}

// Structural equality over every scanned field, offsets included.
// Numbers compare with `Object.is`, so NaN equals NaN and 0 differs from -0.
export function treeEquals(x: S.Node, y: S.Node): boolean {
    if (x === y) {
        return true;
    }
    if (x.kind !== y.kind) {
        return false;
    }
    const xs = scanEntries(x);
    const ys = scanEntries(y);
    if (xs.length !== ys.length) {
        return false;
    }
    for (let i = 0; i < xs.length; i++) {
        if (!entryEquals(xs[i], ys[i])) {
            return false;
        }
    }
    return true;
}

function entryEquals(a: ScanEntry, b: ScanEntry): boolean {
    if (a.name !== b.name) {
        return false;
    }
    switch (a.type) {
        case 'child':
            if (b.type !== 'child') {
                return false;
            }
            if (a.node === null || b.node === null) {
                return a.node === b.node;
            }
            return treeEquals(a.node, b.node);
        case 'children':
            if (b.type !== 'children' || a.nodes.length !== b.nodes.length) {
                return false;
            }
            return a.nodes.every((n, i) => treeEquals(n, b.nodes[i]));
        case 'field':
            return b.type === 'field' && Object.is(a.value, b.value);
        case 'tag':
            return b.type === 'tag' && a.value === b.value;
    }
}
