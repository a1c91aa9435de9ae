#!/usr/bin/env node
/**
 * CLI Entry Point for plan-lineage
 */

import * as fs from 'fs';
import {
    EntityKind,
    formatSessionId,
    isSessionId,
    kindOf,
    parseCommandId,
    parseGoalId,
    parsePlanId,
    parseSessionId,
} from './identifier_format';
import { normalize, parseRawTree } from './normalization_engine';
import { ErrorFactory, isLineageError } from './structured_error';

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
}

const defaultIO: CliIO = {
    out: (line) => process.stdout.write(line + '\n'),
    err: (line) => process.stderr.write(line + '\n'),
};

function readFlag(args: string[], name: string): string | undefined {
    const i = args.indexOf(name);
    if (i === -1) return undefined;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new Error(`${name} expects a value`);
    }
    return value;
}

function positional(args: string[]): string[] {
    const out: string[] = [];
    for (let i = 0; i < args.length; i++) {
        if (args[i].startsWith('--')) {
            i++;
            continue;
        }
        out.push(args[i]);
    }
    return out;
}

export class LineageCLI {
    constructor(private readonly io: CliIO = defaultIO) {}

    /** Returns the process exit code. */
    run(argv: string[]): number {
        const command = argv[2] || 'help';
        const args = argv.slice(3);

        try {
            switch (command) {
                case 'session':
                    return this.runSession(args);
                case 'check':
                    return this.runCheck(args);
                case 'normalize':
                    return this.runNormalize(args);
                default:
                    this.showHelp();
                    return command === 'help' ? 0 : 1;
            }
        } catch (err) {
            if (isLineageError(err)) {
                this.io.err(JSON.stringify(err.toStructured(), null, 2));
                return 1;
            }
            this.io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
            return 1;
        }
    }

    private runSession(args: string[]): number {
        const client = readFlag(args, '--client');
        if (client === undefined) {
            this.io.out(formatSessionId());
            return 0;
        }
        if (!isSessionId(client)) {
            throw ErrorFactory.invalidSessionFormat(client);
        }
        this.io.out(client);
        return 0;
    }

    private runCheck(args: string[]): number {
        const [candidate] = positional(args);
        if (candidate === undefined) {
            this.io.err('Usage: plan-lineage check <id>');
            return 1;
        }

        const kind = kindOf(candidate);
        const parsed =
            kind === EntityKind.Session ? parseSessionId(candidate) :
            kind === EntityKind.Goal ? parseGoalId(candidate) :
            kind === EntityKind.Plan ? parsePlanId(candidate) :
            kind === EntityKind.Command ? parseCommandId(candidate) :
            null;

        this.io.out(JSON.stringify({ id: candidate, canonical: kind !== null, kind, parsed }, null, 2));
        return kind === null ? 1 : 0;
    }

    private runNormalize(args: string[]): number {
        const [file] = positional(args);
        const session = readFlag(args, '--session');
        const offset = readFlag(args, '--offset');
        if (file === undefined || session === undefined) {
            this.io.err('Usage: plan-lineage normalize <file.json> --session <id> [--offset n]');
            return 1;
        }
        if (!isSessionId(session)) {
            throw ErrorFactory.invalidSessionFormat(session);
        }

        const payload: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        const outcome = normalize(session, parseRawTree(payload), {
            goalOffset: offset === undefined ? 0 : Number(offset),
        });

        this.io.out(JSON.stringify(outcome, null, 2));
        return 0;
    }

    private showHelp(): void {
        this.io.out([
            'plan-lineage: canonical identifiers for sessions, goals, plans and commands',
            '',
            'Commands:',
            '  session [--client <id>]                          mint a session id, or validate a client one',
            '  check <id>                                       report the kind and lineage of an id',
            '  normalize <file.json> --session <id> [--offset n] canonicalize a planner reply',
        ].join('\n'));
    }
}

if (require.main === module) {
    process.exitCode = new LineageCLI().run(process.argv);
}
