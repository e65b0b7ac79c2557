import { Slot } from './schema';

// Hands out slots for one source unit. Slots are never reused, so a
// nested scope cannot collide with a slot that is live around it.
export class SlotAllocator {
    private next: Slot;

    constructor(firstSlot: Slot = 0) {
        this.next = firstSlot;
    }

    allocate(): Slot {
        return this.next++;
    }

    // One more than the highest slot handed out so far.
    get size(): number {
        return this.next;
    }
}

export class Scope {
    readonly parent: Scope | null;
    private readonly bindings: Map<string, Slot>;

    constructor(parent: Scope | null) {
        this.parent = parent;
        this.bindings = new Map();
    }

    declare(name: string, slot: Slot): void {
        this.bindings.set(name, slot);
    }

    hasOwn(name: string): boolean {
        return this.bindings.has(name);
    }

    // Nearest enclosing binding of `name`.
    lookup(name: string): Slot | undefined {
        for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
            const slot = scope.bindings.get(name);
            if (slot !== undefined) {
                return slot;
            }
        }
        return undefined;
    }

    get depth(): number {
        return this.parent === null ? 0 : this.parent.depth + 1;
    }
}
