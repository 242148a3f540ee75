import { z } from 'zod';
import type { Move } from '../types';
import { ControllerError } from '../errors';
import { createComponentLogger } from '../logging';

const log = createComponentLogger('controller.protocol');

export const MOVE_TOKENS = {
    'up': 'UP',
    'down': 'DOWN',
    'left': 'LEFT',
    'right': 'RIGHT',
    'reached-goal': 'GOAL',
} as const satisfies Record<Move, string>;

export type MoveToken = (typeof MOVE_TOKENS)[Move];

export const toToken = (move: Move): MoveToken => MOVE_TOKENS[move];

/**
 * Ordered request/response transport to the external controller.
 * `receive` resolves with the next inbound payload; anything other than
 * text is treated as malformed by the adapter.
 */
export interface StepChannel {
    send(token: MoveToken): Promise<void>;
    receive(): Promise<unknown>;
    close(): Promise<void>;
}

export interface Ack {
    token: MoveToken;
    payload: string;
    receivedAt: Date;
}

// Content is opaque; it only has to be text
const AckPayloadSchema = z.string();

export interface StepProtocolOptions {
    /** Give up waiting for an acknowledgement after this many ms. Unbounded when unset. */
    ackTimeoutMs?: number;
}

/**
 * Sends one command token per step and waits for the controller's acknowledgement.
 * Exactly one exchange may be in flight at a time. Without a channel every
 * exchange resolves immediately.
 */
export class StepProtocolAdapter {
    private inFlight = false;

    constructor(
        private readonly channel: StepChannel | null,
        private readonly options: StepProtocolOptions = {}
    ) {}

    static disabled(): StepProtocolAdapter {
        return new StepProtocolAdapter(null);
    }

    get enabled(): boolean {
        return this.channel !== null;
    }

    get busy(): boolean {
        return this.inFlight;
    }

    async sendAndAwait(move: Move): Promise<Ack> {
        const token = toToken(move);
        if (!this.channel) {
            return { token, payload: '', receivedAt: new Date() };
        }
        if (this.inFlight) {
            throw new ControllerError(`Cannot send ${token}: previous command is still awaiting acknowledgement`);
        }

        this.inFlight = true;
        try {
            try {
                await this.channel.send(token);
            } catch (error) {
                throw asControllerError(error, `Failed to send ${token}`);
            }
            log.debug('Command sent, awaiting acknowledgement', { token });

            let raw: unknown;
            try {
                raw = await this.withTimeout(this.channel.receive(), token);
            } catch (error) {
                throw asControllerError(error, `Failed to receive acknowledgement for ${token}`);
            }

            const parsed = AckPayloadSchema.safeParse(raw);
            if (!parsed.success) {
                throw new ControllerError(`Malformed acknowledgement for ${token}`);
            }
            log.debug('Acknowledgement received', { token, payload: parsed.data });
            return { token, payload: parsed.data, receivedAt: new Date() };
        } finally {
            this.inFlight = false;
        }
    }

    async close(): Promise<void> {
        await this.channel?.close();
    }

    private withTimeout<T>(pending: Promise<T>, token: MoveToken): Promise<T> {
        const timeoutMs = this.options.ackTimeoutMs;
        if (timeoutMs === undefined) return pending;

        return new Promise<T>((resolve, reject) => {
            const timer = setTimeout(() => {
                reject(new ControllerError(`No acknowledgement for ${token} within ${timeoutMs}ms`));
            }, timeoutMs);
            pending.then(
                (value) => {
                    clearTimeout(timer);
                    resolve(value);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
    }
}

function asControllerError(error: unknown, message: string): ControllerError {
    if (error instanceof ControllerError) return error;
    return new ControllerError(`${message}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
}
