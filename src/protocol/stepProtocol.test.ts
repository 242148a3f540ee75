import { describe, it, expect, vi } from 'vitest';
import { StepProtocolAdapter, toToken, type StepChannel } from './stepProtocol';
import { ControllerError } from '../errors';

const channelWith = (overrides: Partial<StepChannel> = {}): StepChannel => ({
    send: vi.fn(async () => {}),
    receive: vi.fn(async () => 'ack'),
    close: vi.fn(async () => {}),
    ...overrides,
});

describe('toToken', () => {
    it('spells every move as the controller expects', () => {
        expect(toToken('up')).toBe('UP');
        expect(toToken('down')).toBe('DOWN');
        expect(toToken('left')).toBe('LEFT');
        expect(toToken('right')).toBe('RIGHT');
        expect(toToken('reached-goal')).toBe('GOAL');
    });
});

describe('StepProtocolAdapter', () => {
    it('does nothing when no channel is attached', async () => {
        const adapter = StepProtocolAdapter.disabled();
        expect(adapter.enabled).toBe(false);
        const ack = await adapter.sendAndAwait('left');
        expect(ack.token).toBe('LEFT');
        expect(ack.payload).toBe('');
    });

    it('sends the token, then waits for one acknowledgement', async () => {
        const channel = channelWith({ receive: vi.fn(async () => 'moved') });
        const adapter = new StepProtocolAdapter(channel);

        const ack = await adapter.sendAndAwait('up');

        expect(channel.send).toHaveBeenCalledWith('UP');
        expect(channel.receive).toHaveBeenCalledTimes(1);
        expect(ack.token).toBe('UP');
        expect(ack.payload).toBe('moved');
        expect(adapter.busy).toBe(false);
    });

    it('rejects acknowledgements that are not text', async () => {
        const adapter = new StepProtocolAdapter(channelWith({ receive: async () => Buffer.from([1, 2]) }));
        await expect(adapter.sendAndAwait('down')).rejects.toThrow(new ControllerError('Malformed acknowledgement for DOWN'));
    });

    it('wraps transport failures', async () => {
        const adapter = new StepProtocolAdapter(channelWith({
            send: async () => {
                throw new Error('socket hang up');
            },
        }));
        const failure = adapter.sendAndAwait('right');
        await expect(failure).rejects.toBeInstanceOf(ControllerError);
        await expect(failure).rejects.toThrow('Failed to send RIGHT: socket hang up');
    });

    it('refuses a second command while one is awaiting acknowledgement', async () => {
        let acknowledge: (payload: string) => void = () => {};
        const channel = channelWith({
            receive: vi.fn(() => new Promise<unknown>((resolve) => {
                acknowledge = resolve;
            })),
        });
        const adapter = new StepProtocolAdapter(channel);

        const first = adapter.sendAndAwait('up');
        await vi.waitFor(() => expect(channel.receive).toHaveBeenCalled());
        expect(adapter.busy).toBe(true);

        await expect(adapter.sendAndAwait('down')).rejects.toThrow(
            'Cannot send DOWN: previous command is still awaiting acknowledgement'
        );
        expect(channel.send).toHaveBeenCalledTimes(1);

        acknowledge('ok');
        await expect(first).resolves.toMatchObject({ token: 'UP', payload: 'ok' });
    });

    it('gives up after the acknowledgement timeout', async () => {
        const adapter = new StepProtocolAdapter(
            channelWith({ receive: () => new Promise<unknown>(() => {}) }),
            { ackTimeoutMs: 20 }
        );
        await expect(adapter.sendAndAwait('left')).rejects.toThrow('No acknowledgement for LEFT within 20ms');
        expect(adapter.busy).toBe(false);
    });

    it('closes the channel', async () => {
        const channel = channelWith();
        await new StepProtocolAdapter(channel).close();
        expect(channel.close).toHaveBeenCalledTimes(1);
    });
});
