/**
 * @file Line Channel
 *
 * Line-based input/output used by the interactive menu. The readline
 * implementation queues incoming lines itself, so piped input is not lost
 * while a command is still saving.
 *
 * @module
 */

import * as readline from 'readline';

/**
 * Prompted line input plus line output.
 */
export interface LineChannel {
    /**
     * Show `prompt` and wait for one line of input.
     *
     * @returns The raw line, or null once input has ended.
     */
    question(prompt: string): Promise<string | null>;

    /** Write one line of output. */
    print(text?: string): void;

    /** Release the underlying input. */
    close(): void;
}

/**
 * LineChannel over a readline interface (stdin/stdout by default).
 */
export class ReadlineChannel implements LineChannel {
    private readonly rl: readline.Interface;
    private readonly queued: string[] = [];
    private pending: ((line: string | null) => void) | null = null;
    private ended: boolean = false;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, output, terminal: false });
        this.rl.on('line', (line: string): void => this.line_receive(line));
        this.rl.on('close', (): void => this.input_end());
    }

    public question(prompt: string): Promise<string | null> {
        this.output.write(prompt);

        const next: string | undefined = this.queued.shift();
        if (next !== undefined) return Promise.resolve(next);
        if (this.ended) return Promise.resolve(null);

        return new Promise<string | null>((resolve: (line: string | null) => void): void => {
            this.pending = resolve;
        });
    }

    public print(text: string = ''): void {
        this.output.write(`${text}\n`);
    }

    public close(): void {
        this.rl.close();
    }

    private line_receive(line: string): void {
        if (this.pending) {
            const resolve: (line: string | null) => void = this.pending;
            this.pending = null;
            resolve(line);
            return;
        }
        this.queued.push(line);
    }

    private input_end(): void {
        this.ended = true;
        if (this.pending) {
            const resolve: (line: string | null) => void = this.pending;
            this.pending = null;
            resolve(null);
        }
    }
}
