import { SessionState } from '../types';
import { BaseSessionClient, SessionEvent, SessionEventMap } from './BaseSessionClient';

class TestSessionClient extends BaseSessionClient {
  protected readonly clientName = 'Test';

  delay(attempt: number): number {
    return this.getReconnectDelay(attempt);
  }

  fire<E extends SessionEvent>(event: E, data: SessionEventMap[E]): void {
    this.emit(event, data);
  }

  moveTo(state: SessionState): void {
    this.setState(state);
  }

  nap(ms: number): Promise<void> {
    return this.sleep(ms);
  }

  wake(): void {
    this.interruptSleep();
  }
}

describe('BaseSessionClient', () => {
  describe('getReconnectDelay', () => {
    it('should double from the base delay and cap at the maximum', () => {
      const client = new TestSessionClient();

      expect([1, 2, 3, 4, 5, 6, 7, 20].map(attempt => client.delay(attempt))).toEqual([
        1000, 2000, 4000, 8000, 16000, 30000, 30000, 30000,
      ]);
    });

    it('should honour a custom policy', () => {
      const client = new TestSessionClient({ reconnect: { baseDelayMs: 250, maxDelayMs: 1500 } });

      expect([1, 2, 3, 4].map(attempt => client.delay(attempt))).toEqual([250, 500, 1000, 1500]);
    });

    it('should spread delays by the jitter ratio and stay under the cap', () => {
      const low = new TestSessionClient({ reconnect: { jitter: 0.5 }, random: () => 0 });
      const high = new TestSessionClient({ reconnect: { jitter: 0.5 }, random: () => 0.75 });

      expect(low.delay(1)).toBe(500);
      expect(high.delay(1)).toBe(1250);
      expect(high.delay(6)).toBe(30000);
    });
  });

  describe('events', () => {
    it('should call listeners until they are removed', () => {
      const client = new TestSessionClient();
      const seen: string[] = [];
      const listener = ({ url }: { url: string }) => seen.push(url);

      client.on('connected', listener);
      client.fire('connected', { url: 'wss://one' });
      client.off('connected', listener);
      client.fire('connected', { url: 'wss://two' });

      expect(seen).toEqual(['wss://one']);
    });

    it('should call a once listener a single time', () => {
      const client = new TestSessionClient();
      const attempts: number[] = [];

      client.once('reconnecting', ({ attempt }) => attempts.push(attempt));
      client.fire('reconnecting', { attempt: 1, delayMs: 1000 });
      client.fire('reconnecting', { attempt: 2, delayMs: 2000 });

      expect(attempts).toEqual([1]);
    });

    it('should report a throwing listener as an error event', () => {
      const client = new TestSessionClient();
      const errors: Error[] = [];
      const later = jest.fn();
      client.on('error', error => errors.push(error));
      client.on('connected', () => {
        throw new Error('listener failed');
      });
      client.on('connected', later);

      client.fire('connected', { url: 'wss://one' });

      expect(errors.map(error => error.message)).toEqual(['listener failed']);
      expect(later).toHaveBeenCalledTimes(1);
    });

    it('should log a throwing error listener instead of re-emitting', () => {
      const client = new TestSessionClient();
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      client.on('error', () => {
        throw new Error('error listener failed');
      });

      client.fire('error', new Error('original'));

      expect(consoleError).toHaveBeenCalledTimes(1);
      expect(consoleError.mock.calls[0][0]).toBe('[Test] Event listener error:');
      consoleError.mockRestore();
    });
  });

  describe('setState', () => {
    it('should emit stateChange only for actual transitions', () => {
      const client = new TestSessionClient();
      const changes: Array<SessionEventMap['stateChange']> = [];
      client.on('stateChange', change => changes.push(change));

      client.moveTo('Connecting');
      client.moveTo('Connecting');
      client.moveTo('Authenticating');

      expect(changes).toEqual([
        { from: 'Disconnected', to: 'Connecting' },
        { from: 'Connecting', to: 'Authenticating' },
      ]);
      expect(client.state).toBe('Authenticating');
    });
  });

  describe('sleep', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should resolve after the delay', async () => {
      const client = new TestSessionClient();
      const done = jest.fn();
      const sleeping = client.nap(1000).then(done);

      jest.advanceTimersByTime(999);
      await Promise.resolve();
      expect(done).not.toHaveBeenCalled();

      jest.advanceTimersByTime(1);
      await sleeping;
      expect(done).toHaveBeenCalledTimes(1);
    });

    it('should resolve early when interrupted', async () => {
      const client = new TestSessionClient();
      const sleeping = client.nap(60_000);

      client.wake();

      await expect(sleeping).resolves.toBeUndefined();
      expect(jest.getTimerCount()).toBe(0);
    });
  });
});
