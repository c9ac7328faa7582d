import type { ChildProcess, IOType } from 'node:child_process';
import { spawn } from 'node:child_process';
import process from 'node:process';
import type { Stream } from 'node:stream';
import { PassThrough } from 'node:stream';

import { TransportError } from '../errors.js';
import { ReadBuffer, serializeMessage } from '../shared/stdio.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCMessage, MessageExtraInfo } from '../types.js';

export type StdioServerParameters = {
    /**
     * The executable to run to start the server.
     */
    command: string;

    /**
     * Command line arguments to pass to the executable.
     */
    args?: string[];

    /**
     * The environment to use when spawning the process.
     *
     * If not specified, the result of getDefaultEnvironment() will be used.
     */
    env?: Record<string, string>;

    /**
     * How to handle stderr of the child process. This matches the semantics of Node's `child_process.spawn`.
     *
     * The default is "inherit", meaning messages to stderr will be printed to the parent process's stderr.
     */
    stderr?: IOType | Stream | number;

    /**
     * The working directory to use when spawning the process.
     */
    cwd?: string;
};

/**
 * Environment variables to inherit by default, if an environment is not explicitly given.
 */
export const DEFAULT_INHERITED_ENV_VARS =
    process.platform === 'win32'
        ? ['APPDATA', 'HOMEDRIVE', 'HOMEPATH', 'LOCALAPPDATA', 'PATH', 'PROCESSOR_ARCHITECTURE', 'SYSTEMDRIVE', 'SYSTEMROOT', 'TEMP', 'USERNAME', 'USERPROFILE']
        : ['HOME', 'LOGNAME', 'PATH', 'SHELL', 'TERM', 'USER'];

/**
 * Returns a default environment object including only environment variables deemed safe to inherit.
 */
export function getDefaultEnvironment(): Record<string, string> {
    const env: Record<string, string> = {};

    for (const key of DEFAULT_INHERITED_ENV_VARS) {
        const value = process.env[key];
        if (value === undefined) {
            continue;
        }

        if (value.startsWith('()')) {
            // Skip functions, which are a security risk.
            continue;
        }

        env[key] = value;
    }

    return env;
}

/**
 * Client transport for stdio: this will connect to a server by spawning a process and communicating with it over stdin/stdout.
 */
export class StdioClientTransport implements Transport {
    private _process?: ChildProcess;
    private _readBuffer: ReadBuffer = new ReadBuffer();
    private _serverParams: StdioServerParameters;
    private _stderrStream: PassThrough | null = null;
    private _closed = false;

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    constructor(server: StdioServerParameters) {
        this._serverParams = server;
        if (server.stderr === 'pipe' || server.stderr === 'overlapped') {
            this._stderrStream = new PassThrough();
        }
    }

    /**
     * Starts the server process and prepares to communicate with it.
     */
    async start(): Promise<void> {
        if (this._process) {
            throw new Error('StdioClientTransport already started! If using Client class, note that connect() calls start() automatically.');
        }

        return new Promise((resolve, reject) => {
            const child = spawn(this._serverParams.command, this._serverParams.args ?? [], {
                // merge default env with server env because mcp server needs some env vars
                env: {
                    ...getDefaultEnvironment(),
                    ...this._serverParams.env
                },
                stdio: ['pipe', 'pipe', this._serverParams.stderr ?? 'inherit'],
                shell: false,
                windowsHide: process.platform === 'win32',
                cwd: this._serverParams.cwd
            });
            this._process = child;

            child.on('error', error => {
                reject(error);
                this.onerror?.(TransportError.io(`Failed to run ${this._serverParams.command}: ${error.message}`, error));
            });

            child.on('spawn', () => {
                resolve();
            });

            child.on('close', () => {
                this._process = undefined;
                this._finish();
            });

            child.stdin?.on('error', error => {
                this.onerror?.(TransportError.io(`stdin failed: ${error.message}`, error));
            });

            child.stdout?.on('data', (chunk: Buffer) => {
                this._readBuffer.append(chunk);
                this.processReadBuffer();
            });

            child.stdout?.on('error', error => {
                this.onerror?.(TransportError.io(`stdout failed: ${error.message}`, error));
            });

            if (this._stderrStream && child.stderr) {
                child.stderr.pipe(this._stderrStream);
            }
        });
    }

    /**
     * The stderr stream of the child process, if `StdioServerParameters.stderr` was set to "pipe" or "overlapped".
     *
     * If stderr piping was requested, a PassThrough stream is returned _immediately_, allowing callers to
     * attach listeners before the start method is invoked. This prevents loss of any early
     * error output emitted by the child process.
     */
    get stderr(): Stream | null {
        if (this._stderrStream) {
            return this._stderrStream;
        }

        return this._process?.stderr ?? null;
    }

    /**
     * The child process pid spawned by this transport.
     *
     * This is only available after the transport has been started.
     */
    get pid(): number | null {
        return this._process?.pid ?? null;
    }

    private processReadBuffer() {
        for (;;) {
            try {
                const message = this._readBuffer.readMessage();
                if (message === null) {
                    break;
                }

                this.onmessage?.(message);
            } catch (error) {
                this.onerror?.(error instanceof Error ? error : new Error(String(error)));
            }
        }
    }

    async close(): Promise<void> {
        const child = this._process;
        this._process = undefined;
        if (child && child.exitCode === null && child.signalCode === null) {
            const exited = new Promise<void>(resolve => child.once('close', () => resolve()));
            child.stdin?.end();
            const timer = setTimeout(() => child.kill('SIGTERM'), 2000);
            await exited;
            clearTimeout(timer);
        }
        this._finish();
    }

    send(message: JSONRPCMessage): Promise<void> {
        return new Promise((resolve, reject) => {
            const stdin = this._process?.stdin;
            if (!stdin || this._closed) {
                reject(TransportError.closed('Not connected'));
                return;
            }

            const json = serializeMessage(message);
            if (stdin.write(json)) {
                resolve();
            } else {
                stdin.once('drain', resolve);
            }
        });
    }

    private _finish(): void {
        if (this._closed) {
            return;
        }
        this._closed = true;
        this._readBuffer.clear();
        this.onclose?.();
    }
}
