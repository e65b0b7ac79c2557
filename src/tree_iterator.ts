import * as assert from 'assert';

import * as S from './schema';
import { scanEntries } from './ast_util';

/**
 * This implements a simple depth-first iterator over trees.
 */

export enum IterKind {
    Child = "Child",
    Field = "Field",
    Done = "Done"
};

export class IterResult {
    readonly kind: IterKind;
    readonly name: string;
    readonly node: S.Node | null;
    readonly value: S.Scalar;
    stepNo: number;

    constructor(params: {kind: IterKind, name: string, node: S.Node | null,
                         value: S.Scalar})
    {
        this.kind = params.kind;
        this.name = params.name;
        this.node = params.node;
        this.value = params.value;
        this.stepNo = -1;
    }

    static newChild(name: string, node: S.Node | null): IterResult {
        return new IterResult({kind: IterKind.Child, name, node, value: null});
    }
    static newField(name: string, value: S.Scalar): IterResult {
        return new IterResult({kind: IterKind.Field, name, node: null, value});
    }
    static newDone(stepNo: number): IterResult {
        const result = new IterResult({kind: IterKind.Done, name: '',
                                       node: null, value: null});
        result.stepNo = stepNo;
        return result;
    }

    isChild(): boolean {
        return this.kind === IterKind.Child;
    }
    isField(): boolean {
        return this.kind === IterKind.Field;
    }
    isDone(): boolean {
        return this.kind === IterKind.Done;
    }
}

export class DfsIter {
    readonly root: S.Node;
    private queue: Array<IterResult>;
    private current: IterResult | null;
    private curStep: number;

    constructor(root: S.Node) {
        this.root = root;
        this.queue = [IterResult.newChild('', root)];
        this.current = null;
        this.curStep = 0;
    }

    // Protocol: call next(), then one of step() or cut() before
    // calling next() again. Step descends into the subtree under a
    // child entry; cut skips it. Both are no-ops for fields.
    //
    // Array children are reported one by one, named `name[i]`.
    next(): IterResult {
        assert.ok(this.current === null, 'step() or cut() must follow next()');
        const entry = this.queue.shift();
        if (entry === undefined) {
            return IterResult.newDone(this.curStep);
        }
        entry.stepNo = this.curStep++;
        this.current = entry;
        return entry;
    }

    step(): void {
        assert.ok(this.current !== null, 'next() must precede step()');
        const node = this.current.node;
        if (this.current.isChild() && node !== null) {
            const pending: IterResult[] = [];
            for (const entry of scanEntries(node)) {
                switch (entry.type) {
                    case 'child':
                        pending.push(IterResult.newChild(entry.name, entry.node));
                        break;
                    case 'children':
                        entry.nodes.forEach((child, i) => {
                            pending.push(IterResult.newChild(`${entry.name}[${i}]`, child));
                        });
                        break;
                    case 'field':
                    case 'tag':
                        pending.push(IterResult.newField(entry.name, entry.value));
                        break;
                }
            }
            // Children come before the rest of the parent's siblings.
            this.queue.unshift(...pending);
        }
        this.current = null;
    }

    cut(): void {
        assert.ok(this.current !== null, 'next() must precede cut()');
        this.current = null;
    }
}

// Every node under `root`, parents before children.
export function* preOrder(root: S.Node): Generator<S.Node> {
    const iter = new DfsIter(root);
    while (true) {
        const result = iter.next();
        if (result.isDone()) {
            return;
        }
        if (result.node !== null) {
            yield result.node;
        }
        iter.step();
    }
}
