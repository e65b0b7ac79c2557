export interface ReadStream {
    readonly position: number;
    atEnd(): boolean;
    peek(): string;
    readChar(): string;
}

export class StringStream implements ReadStream {
    readonly text: string;
    position: number;

    constructor(text: string) {
        this.text = text;
        this.position = 0;
    }

    atEnd(): boolean {
        return this.position >= this.text.length;
    }

    // The next character, or '' at the end of input.
    peek(): string {
        return this.atEnd() ? '' : this.text[this.position];
    }

    readChar(): string {
        if (this.atEnd()) {
            throw new Error(`read past end of input at ${this.position}`);
        }
        return this.text[this.position++];
    }

    // Reads characters while `pred` holds.
    readWhile(pred: (ch: string) => boolean): string {
        const start = this.position;
        while (!this.atEnd() && pred(this.text[this.position])) {
            this.position++;
        }
        return this.text.slice(start, this.position);
    }
}
