import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { SubscriptionBroadcaster } from '../broadcaster';
import type { ChangeNotification } from '../../types';
import { FakeSession, settle } from './fake-session';

const T0 = '2026-01-01T00:00:00.000Z';

function renamed(listId: string, revision: number, name: string): ChangeNotification {
  return { listId, revision, committedAt: T0, change: { kind: 'list_renamed', name } };
}

describe('SubscriptionBroadcaster', () => {
  let broadcaster: SubscriptionBroadcaster;
  let alice: FakeSession;
  let bob: FakeSession;

  beforeEach(() => {
    broadcaster = new SubscriptionBroadcaster();
    alice = new FakeSession('alice');
    bob = new FakeSession('bob');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('notifies only the sessions subscribed to the list', () => {
    broadcaster.subscribe(alice, 'groceries');
    broadcaster.subscribe(bob, 'hardware');

    const delivered = broadcaster.notify('groceries', renamed('groceries', 1, 'Weekly'));

    expect(delivered).toBe(1);
    expect(alice.received).toEqual([{ type: 'list_changed', data: renamed('groceries', 1, 'Weekly') }]);
    expect(bob.received).toEqual([]);
  });

  test('notifications reach each session in commit order', () => {
    broadcaster.subscribe(alice, 'groceries');

    broadcaster.notify('groceries', renamed('groceries', 1, 'A'));
    broadcaster.notify('groceries', renamed('groceries', 2, 'B'));
    broadcaster.notify('groceries', renamed('groceries', 3, 'C'));

    const revisions = alice.received.map((message) => (message.type === 'list_changed' ? message.data.revision : -1));
    expect(revisions).toEqual([1, 2, 3]);
  });

  test('subscribing twice counts once', () => {
    broadcaster.subscribe(alice, 'groceries');
    broadcaster.subscribe(alice, 'groceries');

    expect(broadcaster.subscriberCount('groceries')).toBe(1);
    expect(broadcaster.notify('groceries', renamed('groceries', 1, 'A'))).toBe(1);
  });

  test('unsubscribe reports whether there was a subscription', () => {
    broadcaster.subscribe(alice, 'groceries');

    expect(broadcaster.unsubscribe(alice, 'groceries')).toBe(true);
    expect(broadcaster.unsubscribe(alice, 'groceries')).toBe(false);
    expect(broadcaster.notify('groceries', renamed('groceries', 1, 'A'))).toBe(0);
  });

  test('unsubscribeAll returns every list the session left', () => {
    broadcaster.subscribe(alice, 'groceries');
    broadcaster.subscribe(alice, 'hardware');

    expect(broadcaster.unsubscribeAll(alice)).toEqual(['groceries', 'hardware']);
    expect(broadcaster.isSubscribed(alice, 'hardware')).toBe(false);
  });

  test('a failing session is evicted without affecting the others', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const evicted = vi.fn();
    broadcaster.on('evicted', evicted);
    broadcaster.subscribe(alice, 'groceries');
    broadcaster.subscribe(alice, 'hardware');
    broadcaster.subscribe(bob, 'groceries');
    alice.failing = true;

    broadcaster.notify('groceries', renamed('groceries', 1, 'A'));
    broadcaster.notify('groceries', renamed('groceries', 2, 'B'));
    await settle();

    expect(bob.received).toHaveLength(2);
    expect(broadcaster.isSubscribed(alice, 'groceries')).toBe(false);
    expect(broadcaster.isSubscribed(alice, 'hardware')).toBe(false);
    expect(evicted).toHaveBeenCalledTimes(1);
    expect(evicted.mock.calls[0][0]).toBe(alice);
  });

  test('a session that throws while sending is evicted too', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const throwing = new FakeSession('carol');
    throwing.deliver = () => {
      throw new Error('closed');
    };
    broadcaster.subscribe(throwing, 'groceries');

    broadcaster.notify('groceries', renamed('groceries', 1, 'A'));

    expect(broadcaster.subscriberCount('groceries')).toBe(0);
  });

  test('deleting a list drops its subscribers after the last notification', () => {
    broadcaster.subscribe(alice, 'groceries');

    broadcaster.notify('groceries', { listId: 'groceries', revision: 3, committedAt: T0, change: { kind: 'list_deleted' } });

    expect(alice.received).toHaveLength(1);
    expect(broadcaster.subscriberCount('groceries')).toBe(0);
  });
});
