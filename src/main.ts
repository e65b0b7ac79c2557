#!/usr/bin/env node
import * as fs from 'fs';

import { countNodes, frameSize, freeSlots, verifySlots } from './analysis';
import { dump, toTaggedJson } from './dump';
import { readDump, readExpr } from './read_dump';
import { unparse } from './unparse';

export type Command = 'check' | 'json' | 'unparse' | 'stats';

const COMMANDS: ReadonlyArray<Command> = ['check', 'json', 'unparse', 'stats'];

export interface CliOptions {
    command: Command;
    file: string;
    // Slots `0..globals-1` are bound before the program starts.
    globals: number;
    verbose: boolean;
}

export const USAGE =
    'Usage: jtree --check|--json|--unparse|--stats [--globals N] [--verbose] <file>';

function commandOf(flag: string): Command | null {
    for (const command of COMMANDS) {
        if (flag === `--${command}`) {
            return command;
        }
    }
    return null;
}

export function parseArgs(args: ReadonlyArray<string>): CliOptions {
    let command: Command | null = null;
    let file: string | null = null;
    let globals = 0;
    let verbose = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const asCommand = commandOf(arg);
        if (asCommand !== null) {
            if (command !== null) {
                throw new Error(`More than one command given: --${command} and ${arg}`);
            }
            command = asCommand;
        } else if (arg === '--verbose') {
            verbose = true;
        } else if (arg === '--globals') {
            const value = args[++i];
            if (value === undefined || !/^[0-9]+$/.test(value)) {
                throw new Error(`--globals needs a non-negative integer`);
            }
            globals = Number(value);
        } else if (arg.startsWith('--')) {
            throw new Error(`Unrecognized option: ${arg}`);
        } else if (file === null) {
            file = arg;
        } else {
            throw new Error(`Unexpected argument: ${arg}`);
        }
    }

    if (command === null) {
        throw new Error('No command given');
    }
    if (file === null) {
        throw new Error('Filename not given.');
    }
    return {command, file, globals, verbose};
}

function range(n: number): number[] {
    return Array.from({length: n}, (_, i) => i);
}

// Output for one command applied to the dump text `text`.
export function run(options: CliOptions, text: string): string {
    switch (options.command) {
        case 'check': {
            const node = readDump(text);
            verifySlots(node, {globalSlots: range(options.globals)});
            return dump(node);
        }
        case 'json':
            return JSON.stringify(toTaggedJson(readDump(text)), null, 2);
        case 'unparse':
            return unparse(readExpr(text));
        case 'stats': {
            const node = readDump(text);
            const free = freeSlots(node);
            return [
                `nodes: ${countNodes(node)}`,
                `frame size: ${frameSize(node)}`,
                `free slots: ${free.length === 0 ? 'none' : free.join(' ')}`,
            ].join('\n');
        }
    }
}

function main() {
    let options: CliOptions;
    try {
        options = parseArgs(process.argv.slice(2));
    } catch (e) {
        console.error(e instanceof Error ? e.message : String(e));
        console.error(USAGE);
        process.exitCode = 2;
        return;
    }

    try {
        if (options.verbose) {
            console.error(`reading ${options.file}`);
        }
        const text = fs.readFileSync(options.file, 'utf8');
        if (options.verbose) {
            console.error(`running --${options.command} on ${text.length} characters`);
        }
        console.log(run(options, text));
    } catch (e) {
        console.error(e instanceof Error ? `${e.name}: ${e.message}` : String(e));
        process.exitCode = 1;
    }
}

if (require.main === module) {
    main();
}
