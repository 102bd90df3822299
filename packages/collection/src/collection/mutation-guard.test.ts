import { describe, expect, it, vi } from 'vitest';
import { MutationGuard } from './mutation-guard.js';

describe('MutationGuard', () => {
  it('should report whether it is held', () => {
    const guard = new MutationGuard('immediate');
    let inside = false;

    guard.run(() => {
      inside = guard.held;
    });

    expect(inside).toBe(true);
    expect(guard.held).toBe(false);
  });

  it('should allow re-entry', () => {
    const guard = new MutationGuard('immediate');

    const result = guard.run(() => guard.run(() => guard.run(() => 42)));

    expect(result).toBe(42);
    expect(guard.held).toBe(false);
  });

  it('should release when the body throws', () => {
    const guard = new MutationGuard('deferred');

    expect(() =>
      guard.run(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(guard.held).toBe(false);
  });

  describe('immediate mode', () => {
    it('should publish inline', () => {
      const guard = new MutationGuard('immediate');
      const publish = vi.fn();

      guard.run(() => {
        guard.emit(publish);
        expect(publish).toHaveBeenCalledTimes(1);
      });
    });
  });

  describe('deferred mode', () => {
    it('should publish when the outermost run returns', () => {
      const guard = new MutationGuard('deferred');
      const order: string[] = [];

      guard.run(() => {
        guard.emit(() => order.push('outer'));
        guard.run(() => {
          guard.emit(() => order.push('inner'));
        });
        expect(order).toEqual([]);
      });

      expect(order).toEqual(['outer', 'inner']);
    });

    it('should append emissions requested while draining to the same queue', () => {
      const guard = new MutationGuard('deferred');
      const order: string[] = [];

      guard.run(() => {
        guard.emit(() => {
          order.push('first');
          guard.run(() => {
            guard.emit(() => order.push('nested'));
          });
          order.push('first-done');
        });
        guard.emit(() => order.push('second'));
      });

      expect(order).toEqual(['first', 'first-done', 'second', 'nested']);
    });

    it('should drain a lone queued emission', () => {
      const guard = new MutationGuard('deferred');
      const publish = vi.fn();

      guard.run(() => guard.emit(publish));

      expect(publish).toHaveBeenCalledTimes(1);
    });
  });
});
