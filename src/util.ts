const IDENTIFIER = /^[_a-zA-Z][_a-zA-Z0-9]*$/;
const NUMBER = /^-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?$/;

export const KEYWORDS: ReadonlySet<string> = new Set([
    'assert', 'else', 'error', 'false', 'for', 'function', 'if', 'import',
    'importstr', 'in', 'local', 'null', 'tailstrict', 'then', 'self',
    'super', 'true',
]);

export function isIdentifier(s: string): boolean {
    return IDENTIFIER.test(s) && !KEYWORDS.has(s);
}

// Shortest text that reads back to the same float64, including the
// values `String` cannot tell apart (-0) or JSON cannot carry.
export function formatNumber(n: number): string {
    if (Object.is(n, -0)) {
        return '-0';
    }
    // String() already gives NaN, Infinity and -Infinity.
    return String(n);
}

// Inverse of `formatNumber`. Returns null when `text` is not a number.
export function parseNumber(text: string): number | null {
    switch (text) {
        case 'NaN': return NaN;
        case 'Infinity': return Infinity;
        case '-Infinity': return -Infinity;
    }
    if (!NUMBER.test(text)) {
        return null;
    }
    return Number(text);
}

export function isSlot(n: number): boolean {
    return Number.isSafeInteger(n) && n >= 0;
}

// Read-only views with no mutators; the backing collection is never handed out.
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
    private readonly map: Map<K, V>;

    constructor(entries: Iterable<readonly [K, V]>) {
        this.map = new Map(entries);
        Object.freeze(this);
    }

    get size(): number {
        return this.map.size;
    }

    get(key: K): V | undefined {
        return this.map.get(key);
    }

    has(key: K): boolean {
        return this.map.has(key);
    }

    forEach(f: (value: V, key: K, map: ReadonlyMap<K, V>) => void,
            thisArg?: unknown): void
    {
        this.map.forEach((value, key) => f.call(thisArg, value, key, this));
    }

    entries() {
        return this.map.entries();
    }

    keys() {
        return this.map.keys();
    }

    values() {
        return this.map.values();
    }

    [Symbol.iterator]() {
        return this.map.entries();
    }
}

export class FrozenSet<T> implements ReadonlySet<T> {
    private readonly set: Set<T>;

    constructor(values: Iterable<T>) {
        this.set = new Set(values);
        Object.freeze(this);
    }

    get size(): number {
        return this.set.size;
    }

    has(value: T): boolean {
        return this.set.has(value);
    }

    forEach(f: (value: T, value2: T, set: ReadonlySet<T>) => void,
            thisArg?: unknown): void
    {
        this.set.forEach(value => f.call(thisArg, value, value, this));
    }

    entries() {
        return this.set.entries();
    }

    keys() {
        return this.set.keys();
    }

    values() {
        return this.set.values();
    }

    [Symbol.iterator]() {
        return this.set.values();
    }
}
