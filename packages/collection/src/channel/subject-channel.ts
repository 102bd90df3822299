import { type Observable, Subject, type Unsubscribable } from 'rxjs';
import type { ChangeEvent, ChannelFactory, ChannelObserver, EventChannel } from '../types.js';

/**
 * {@link EventChannel} backed by an RxJS `Subject`.
 *
 * A `Subject` multicasts synchronously in subscription order, replays
 * nothing, and hands completion to anyone subscribing after `complete()`.
 */
export class SubjectChannel<T> implements EventChannel<T> {
  private readonly subject$ = new Subject<T>();
  private completed = false;

  get closed(): boolean {
    return this.completed;
  }

  /** Whether anyone is currently subscribed */
  get observed(): boolean {
    return this.subject$.observed;
  }

  publish(value: T): void {
    this.subject$.next(value);
  }

  subscribe(observer: ChannelObserver<T>): Unsubscribable {
    return this.subject$.subscribe(observer);
  }

  complete(): void {
    this.completed = true;
    this.subject$.complete();
  }

  asObservable(): Observable<T> {
    return this.subject$.asObservable();
  }
}

/** Default channel factory: one {@link SubjectChannel} per stream */
export function subjectChannels<T>(): ChannelFactory<T> {
  return {
    snapshots: () => new SubjectChannel<readonly T[]>(),
    changes: () => new SubjectChannel<ChangeEvent<T>>(),
  };
}
