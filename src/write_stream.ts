export interface WriteStream {
    write(s: string): number;
}

export class StringWriteStream implements WriteStream {
    private readonly chunks: Array<string>;
    private length: number;

    constructor() {
        this.chunks = [];
        this.length = 0;
    }

    get size(): number {
        return this.length;
    }

    write(s: string): number {
        this.chunks.push(s);
        this.length += s.length;
        return s.length;
    }

    toString(): string {
        return this.chunks.join('');
    }
}

// Writes S-expressions, keeping exactly one space between siblings.
export class SexprWriter {
    readonly stream: WriteStream;
    private needSpace: boolean;

    constructor(stream: WriteStream) {
        this.stream = stream;
        this.needSpace = false;
    }

    open(head?: string): number {
        let n = this.separate() + this.stream.write('(');
        this.needSpace = false;
        if (head !== undefined) {
            n += this.atom(head);
        }
        return n;
    }

    close(): number {
        this.needSpace = true;
        return this.stream.write(')');
    }

    atom(text: string): number {
        const n = this.separate() + this.stream.write(text);
        this.needSpace = true;
        return n;
    }

    private separate(): number {
        return this.needSpace ? this.stream.write(' ') : 0;
    }
}
