import cac from 'cac';
import fs from 'fs';
import path from 'path';
import { describeMessage, formatBytes, startTimer } from './debug';
import { toError } from './errors';
import { SyncSession } from './session/SyncSession';
import type { Transport } from './transport/Transport';
import { WebSocketTransport } from './transport/WebSocketTransport';
import { Logger } from './utils/Logger';
import { parseMessage } from './validation';

export interface InspectResult {
    /** One summary per non-blank line, prefixed with its line number. */
    lines: string[];
    valid: number;
    invalid: number;
}

/**
 * Validates a capture (one JSON frame per line) and summarises each frame.
 */
export function inspectCapture(text: string): InspectResult {
    const result: InspectResult = { lines: [], valid: 0, invalid: 0 };

    text.split(/\r?\n/).forEach((line, i) => {
        if (line.trim() === '') return;
        try {
            result.lines.push(`${i + 1}: ${describeMessage(parseMessage(line))}`);
            result.valid++;
        } catch (e) {
            result.lines.push(`${i + 1}: ❌ ${toError(e).message}`);
            result.invalid++;
        }
    });

    return result;
}

export interface CLIDependencies {
    createTransport?: (logger: Logger) => Transport;
    print?: (line: string) => void;
    printError?: (line: string) => void;
}

export function readVersion(): string {
    try {
        const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '..', 'package.json'), 'utf8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
    } catch (e) {
        return `unknown (${toError(e).message})`;
    }
    return 'unknown';
}

export function createCLI(deps: CLIDependencies = {}) {
    const print = deps.print ?? ((line: string) => console.log(line));
    const printError = deps.printError ?? ((line: string) => console.error(line));
    const createTransport = deps.createTransport ?? ((logger: Logger) => new WebSocketTransport({ logger }));

    const cli = cac('segsync');

    cli
        .command('inspect <file>', 'Validate and summarise a capture of wire frames (one JSON frame per line)')
        .action((file: string) => {
            let text: string;
            try {
                text = fs.readFileSync(file, 'utf8');
            } catch (e) {
                printError(`❌ Cannot read ${file}: ${toError(e).message}`);
                process.exitCode = 1;
                return;
            }

            const timer = startTimer();
            const result = inspectCapture(text);
            result.lines.forEach(print);
            print(`${result.valid} valid, ${result.invalid} invalid (${formatBytes(text.length)}, ${timer.elapsed().toFixed(1)}ms)`);
            if (result.invalid > 0) {
                process.exitCode = 1;
            }
        });

    cli
        .command('watch <url>', 'Join a session without a volume and log every inbound frame')
        .option('--user <id>', 'Participant id to join as')
        .option('--token <token>', 'Access token appended to the URL')
        .option('--debug', 'Verbose logging')
        .action(async (url: string, options: { user?: string; token?: string; debug?: boolean }) => {
            if (!options.user) {
                printError('❌ --user is required');
                process.exitCode = 1;
                return;
            }

            const logger = new Logger('SegSync:Watch', options.debug === true);
            const transport = createTransport(logger.child('Transport'));
            transport.on('message', (text) => {
                try {
                    print(describeMessage(parseMessage(text)));
                } catch (e) {
                    printError(`❌ ${toError(e).message}`);
                }
            });

            const session = new SyncSession({
                participantId: options.user,
                transport,
                logger,
                config: { debug: options.debug === true },
            });
            const stop = () => session.destroy();
            session.on('sessionEnded', () => print('Session ended by the server'));
            session.on('disconnected', (error) => {
                process.off('SIGINT', stop);
                if (error) printError(`❌ ${error.message}`);
            });

            try {
                await session.connect(url, { token: options.token });
                print(`Watching as ${options.user}; Ctrl+C to stop`);
            } catch (e) {
                printError(`❌ ${toError(e).message}`);
                process.exitCode = 1;
                return;
            }

            process.once('SIGINT', stop);
        });

    cli.help();
    cli.version(readVersion());

    return cli;
}
