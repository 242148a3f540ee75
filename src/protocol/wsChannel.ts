/**
 * WebSocket transport for the step protocol.
 *
 * Commands go out on the target endpoint, acknowledgements come back on the
 * response endpoint. When both endpoints are the same, a single socket carries
 * both directions.
 */

import WebSocket from 'ws';
import { ControllerError } from '../errors';
import { createComponentLogger } from '../logging';
import type { MoveToken, StepChannel } from './stepProtocol';

const log = createComponentLogger('controller.ws');

export interface WebSocketEndpoints {
    /** Base URL, e.g. ws://127.0.0.1:10000 */
    url: string;
    /** Outbound ("to controller") endpoint path */
    target: string;
    /** Inbound ("from controller") endpoint path */
    response: string;
    connectTimeoutMs?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

type Waiter = { resolve: (payload: unknown) => void; reject: (error: ControllerError) => void };

export const endpointUrl = (base: string, path: string): string =>
    base.replace(/\/+$/, '') + (path.startsWith('/') ? path : `/${path}`);

export class WebSocketStepChannel implements StepChannel {
    private readonly inbox: unknown[] = [];
    private waiter: Waiter | null = null;
    private failure: ControllerError | null = null;

    private constructor(private readonly outbound: WebSocket, private readonly inbound: WebSocket) {
        inbound.on('message', (data, isBinary) => {
            // Binary frames are passed on raw so the protocol layer rejects them
            const payload: unknown = isBinary ? data : data.toString();
            if (this.waiter) {
                const { resolve } = this.waiter;
                this.waiter = null;
                resolve(payload);
            } else {
                this.inbox.push(payload);
            }
        });

        for (const socket of new Set([outbound, inbound])) {
            socket.on('close', () => this.fail(new ControllerError(`Controller disconnected (${socket.url})`)));
            socket.on('error', (error) => {
                log.error('WebSocket error', error, { url: socket.url });
                this.fail(new ControllerError(`Controller connection error: ${error.message}`, { cause: error }));
            });
        }
    }

    static async connect(endpoints: WebSocketEndpoints): Promise<WebSocketStepChannel> {
        const targetUrl = endpointUrl(endpoints.url, endpoints.target);
        const responseUrl = endpointUrl(endpoints.url, endpoints.response);
        const timeoutMs = endpoints.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

        const outbound = await open(targetUrl, timeoutMs);
        let inbound = outbound;
        if (responseUrl !== targetUrl) {
            try {
                inbound = await open(responseUrl, timeoutMs);
            } catch (error) {
                outbound.close();
                throw error;
            }
        }
        log.info('Connected to controller', { target: targetUrl, response: responseUrl });
        return new WebSocketStepChannel(outbound, inbound);
    }

    send(token: MoveToken): Promise<void> {
        if (this.failure) return Promise.reject(this.failure);
        // Anything received before this command cannot acknowledge it
        if (this.inbox.length > 0) {
            log.warn('Discarding unsolicited controller messages', { count: this.inbox.length, token });
            this.inbox.length = 0;
        }
        if (this.outbound.readyState !== WebSocket.OPEN) {
            return Promise.reject(new ControllerError(`Cannot send ${token}: controller socket is not open`));
        }
        return new Promise((resolve, reject) => {
            this.outbound.send(token, (error) => {
                if (error) {
                    reject(new ControllerError(`Failed to send ${token}: ${error.message}`, { cause: error }));
                } else {
                    resolve();
                }
            });
        });
    }

    receive(): Promise<unknown> {
        if (this.inbox.length > 0) return Promise.resolve(this.inbox.shift());
        if (this.failure) return Promise.reject(this.failure);
        if (this.waiter) {
            return Promise.reject(new ControllerError('A receive is already pending'));
        }
        return new Promise((resolve, reject) => {
            this.waiter = { resolve, reject };
        });
    }

    async close(): Promise<void> {
        // Closing on purpose is not a failure of the exchange
        this.failure ??= new ControllerError('Channel closed');
        await Promise.all([...new Set([this.outbound, this.inbound])].map(closeSocket));
    }

    private fail(error: ControllerError): void {
        if (this.failure) return;
        this.failure = error;
        if (this.waiter) {
            const { reject } = this.waiter;
            this.waiter = null;
            reject(error);
        }
    }
}

function open(url: string, timeoutMs: number): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
        const socket = new WebSocket(url);
        const timer = setTimeout(() => {
            socket.terminate();
            reject(new ControllerError(`Timed out connecting to ${url}`));
        }, timeoutMs);

        socket.once('open', () => {
            clearTimeout(timer);
            resolve(socket);
        });
        socket.once('error', (error) => {
            clearTimeout(timer);
            reject(new ControllerError(`Cannot connect to ${url}: ${error.message}`, { cause: error }));
        });
    });
}

function closeSocket(socket: WebSocket): Promise<void> {
    if (socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
        socket.once('close', () => resolve());
        socket.close();
    });
}
