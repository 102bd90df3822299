import { describe, expect, it, vi } from 'vitest';
import { SubjectChannel, subjectChannels } from './subject-channel.js';

describe('SubjectChannel', () => {
  it('should multicast in publish order', () => {
    const channel = new SubjectChannel<number>();
    const a: number[] = [];
    const b: number[] = [];
    channel.subscribe((v) => a.push(v));
    channel.subscribe({ next: (v) => b.push(v) });

    channel.publish(1);
    channel.publish(2);

    expect(a).toEqual([1, 2]);
    expect(b).toEqual([1, 2]);
  });

  it('should not replay to late subscribers', () => {
    const channel = new SubjectChannel<string>();
    channel.publish('early');

    const seen: string[] = [];
    channel.subscribe((v) => seen.push(v));
    channel.publish('late');

    expect(seen).toEqual(['late']);
  });

  it('should track subscribers', () => {
    const channel = new SubjectChannel<number>();
    expect(channel.observed).toBe(false);

    const handle = channel.subscribe(() => undefined);
    expect(channel.observed).toBe(true);

    handle.unsubscribe();
    expect(channel.observed).toBe(false);
  });

  it('should complete current and late subscribers', () => {
    const channel = new SubjectChannel<number>();
    const early = vi.fn();
    channel.subscribe({ complete: early });

    channel.complete();
    const late = vi.fn();
    channel.asObservable().subscribe({ complete: late });

    expect(channel.closed).toBe(true);
    expect(early).toHaveBeenCalledTimes(1);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('should ignore publishes after completion', () => {
    const channel = new SubjectChannel<number>();
    const next = vi.fn();
    channel.subscribe(next);

    channel.complete();
    channel.publish(1);

    expect(next).not.toHaveBeenCalled();
  });

  it('should create a fresh pair of channels per call', () => {
    const factory = subjectChannels<number>();
    expect(factory.changes()).not.toBe(factory.changes());
    expect(factory.snapshots()).toBeInstanceOf(SubjectChannel);
  });
});
