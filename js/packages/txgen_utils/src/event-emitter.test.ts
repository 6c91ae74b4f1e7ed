import { TypedEventEmitter } from './event-emitter';

interface TestEvents {
  tick: [score: bigint];
  pair: [left: string, right: number];
}

describe('TypedEventEmitter', () => {
  test('delivers arguments to every listener in registration order', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const calls: string[] = [];

    emitter.on('pair', (left, right) => calls.push(`a:${left}${right}`));
    emitter.on('pair', (left, right) => calls.push(`b:${left}${right}`));

    expect(emitter.emit('pair', 'x', 1)).toBe(true);
    expect(calls).toEqual(['a:x1', 'b:x1']);
  });

  test('returns false when nobody listens', () => {
    const emitter = new TypedEventEmitter<TestEvents>();

    expect(emitter.emit('tick', 1n)).toBe(false);
  });

  test('removes a listener with off', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const listener = jest.fn();

    emitter.on('tick', listener);
    emitter.off('tick', listener);
    emitter.emit('tick', 5n);

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount('tick')).toBe(0);
  });

  test('once listeners fire a single time', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const listener = jest.fn();

    emitter.once('tick', listener);
    emitter.emit('tick', 1n);
    emitter.emit('tick', 2n);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(1n);
  });

  test('a throwing listener does not stop the others', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation();
    const emitter = new TypedEventEmitter<TestEvents>();
    const second = jest.fn();

    emitter.on('tick', () => {
      throw new Error('listener failure');
    });
    emitter.on('tick', second);

    expect(() => emitter.emit('tick', 3n)).not.toThrow();
    expect(second).toHaveBeenCalledWith(3n);

    errorSpy.mockRestore();
  });

  test('removeAllListeners clears one event or all of them', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    emitter.on('tick', jest.fn());
    emitter.on('pair', jest.fn());

    emitter.removeAllListeners('tick');
    expect(emitter.listenerCount('tick')).toBe(0);
    expect(emitter.listenerCount('pair')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('pair')).toBe(0);
  });
});
