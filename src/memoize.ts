import * as S from './schema';
import { scanEntries } from './ast_util';
import { formatNumber } from './util';

// True when `y` is an instance of the same node class as `x`.
function sameKind<T extends S.Node>(x: T, y: S.Node): y is T {
    return x.constructor === y.constructor;
}

/**
 * Shares structurally identical subtrees. Nodes must be handed in bottom
 * up, children before their parents, so that children can be compared by
 * identity; a node is only ever replaced by one with equal fields.
 */
export class Memoizer {
    readonly entries: Map<string, S.Node>;
    readonly counts: Map<S.Node, number>;
    private readonly ids: WeakMap<S.Node, number>;
    private nextId: number;

    constructor() {
        this.entries = new Map();
        this.counts = new Map();
        this.ids = new WeakMap();
        this.nextId = 0;
    }

    memo<T extends S.Node>(node: T): T {
        const key = this.key(node);
        const found = this.entries.get(key);
        if (found !== undefined && sameKind(node, found)) {
            this.counts.set(found, (this.counts.get(found) ?? 0) + 1);
            return found;
        }
        this.entries.set(key, node);
        this.counts.set(node, 1);
        return node;
    }

    // Number of distinct nodes seen.
    get size(): number {
        return this.entries.size;
    }

    private id(node: S.Node): number {
        let id = this.ids.get(node);
        if (id === undefined) {
            id = this.nextId++;
            this.ids.set(node, id);
        }
        return id;
    }

    // Shallow key: scalar fields by value, children by identity.
    private key(node: S.Node): string {
        const parts: Array<string | number | boolean | null | number[]> = [node.kind];
        for (const entry of scanEntries(node)) {
            switch (entry.type) {
                case 'child':
                    parts.push(entry.node === null ? null : this.id(entry.node));
                    break;
                case 'children':
                    parts.push(entry.nodes.map(n => this.id(n)));
                    break;
                case 'field':
                    if (typeof entry.value === 'number') {
                        parts.push(`n:${formatNumber(entry.value)}`);
                    } else if (typeof entry.value === 'string') {
                        parts.push(`s:${entry.value}`);
                    } else {
                        parts.push(entry.value);
                    }
                    break;
                case 'tag':
                    parts.push(entry.value);
                    break;
            }
        }
        return JSON.stringify(parts);
    }
}
