import { createInterface, type Interface } from 'readline/promises';

/**
 * Interactive questions asked by the commands. The terminal implementation
 * reads stdin; tests script the answers.
 */
export interface Prompter {
    confirm(question: string): Promise<boolean>;
    /** Blank answer keeps `current` */
    ask(question: string, current: string): Promise<string>;
    /** A number picks a listed option; other text is taken as typed; blank keeps `current` */
    choose(question: string, options: readonly string[], current: string): Promise<string>;
    close(): void;
}

const YES = ['y', 'yes'];

export function parseConfirmation(answer: string): boolean {
    return YES.includes(answer.trim().toLowerCase());
}

export function resolveChoice(answer: string, options: readonly string[], current: string): string {
    const trimmed = answer.trim();
    if (trimmed === '') return current;

    if (/^\d+$/.test(trimmed)) {
        const index = parseInt(trimmed, 10) - 1;
        if (index >= 0 && index < options.length) return options[index];
    }

    return trimmed;
}

export class ReadlinePrompter implements Prompter {
    private readonly rl: Interface;

    constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
        this.rl = createInterface({ input, output });
    }

    async confirm(question: string): Promise<boolean> {
        return parseConfirmation(await this.rl.question(`${question} [y/N] `));
    }

    async ask(question: string, current: string): Promise<string> {
        const answer = await this.rl.question(current ? `${question} [${current}]: ` : `${question}: `);
        return answer.trim() === '' ? current : answer.trim();
    }

    async choose(question: string, options: readonly string[], current: string): Promise<string> {
        const list = options.map((option, i) => `  ${i + 1}) ${option}`).join('\n');
        const answer = await this.rl.question(`${question}\n${list}\n${current ? `[${current}]` : ''}> `);
        return resolveChoice(answer, options, current);
    }

    close(): void {
        this.rl.close();
    }
}
