/**
 * Subscription bookkeeping and fan-out of change notifications.
 *
 * Each delivery is an independent promise: a slow or dead session never
 * holds up the others. A failed delivery evicts the session from every
 * list and emits 'evicted' so the transport can be torn down.
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../errors';
import type { ChangeNotification } from '../types';
import type { ChangePush, ServerMessage } from './protocol';

export interface SubscriberSession {
  readonly id: string;
  /**
   * Queue a message for this session. Messages are sent in call order;
   * the promise rejects when the transport could not take the message.
   */
  deliver(message: ServerMessage): Promise<void>;
}

export class SubscriptionBroadcaster extends EventEmitter {
  // listId -> sessionId -> session
  private subscribers = new Map<string, Map<string, SubscriberSession>>();
  // sessionId -> listIds
  private memberships = new Map<string, Set<string>>();
  private evicted = new WeakSet<SubscriberSession>();

  subscribe(session: SubscriberSession, listId: string): void {
    let sessions = this.subscribers.get(listId);
    if (!sessions) {
      sessions = new Map();
      this.subscribers.set(listId, sessions);
    }
    sessions.set(session.id, session);

    let lists = this.memberships.get(session.id);
    if (!lists) {
      lists = new Set();
      this.memberships.set(session.id, lists);
    }
    lists.add(listId);
  }

  /** Returns false when the session was not subscribed to the list */
  unsubscribe(session: SubscriberSession, listId: string): boolean {
    const sessions = this.subscribers.get(listId);
    if (!sessions || !sessions.delete(session.id)) return false;
    if (sessions.size === 0) this.subscribers.delete(listId);

    const lists = this.memberships.get(session.id);
    lists?.delete(listId);
    if (lists && lists.size === 0) this.memberships.delete(session.id);
    return true;
  }

  /** Drop every subscription of a session; returns the list ids it left */
  unsubscribeAll(session: SubscriberSession): string[] {
    const lists = [...(this.memberships.get(session.id) ?? [])];
    for (const listId of lists) {
      this.unsubscribe(session, listId);
    }
    return lists;
  }

  isSubscribed(session: SubscriberSession, listId: string): boolean {
    return this.subscribers.get(listId)?.has(session.id) ?? false;
  }

  subscriberCount(listId: string): number {
    return this.subscribers.get(listId)?.size ?? 0;
  }

  /**
   * Deliver a change to every session subscribed to the list right now.
   * Returns how many sessions it was handed to.
   */
  notify(listId: string, notification: ChangeNotification): number {
    const sessions = this.subscribers.get(listId);
    if (!sessions) return 0;

    const message: ChangePush = { type: 'list_changed', data: notification };
    const targets = [...sessions.values()];
    for (const session of targets) {
      this.deliver(session, message);
    }

    if (notification.change.kind === 'list_deleted') {
      this.dropList(listId);
    }
    return targets.length;
  }

  /** Forget every subscription to a list */
  dropList(listId: string): void {
    const sessions = this.subscribers.get(listId);
    if (!sessions) return;
    for (const session of [...sessions.values()]) {
      this.unsubscribe(session, listId);
    }
  }

  /** Send one message to one session, evicting it if the transport fails */
  deliver(session: SubscriberSession, message: ServerMessage): void {
    let pending: Promise<void>;
    try {
      pending = session.deliver(message);
    } catch (error: unknown) {
      this.evict(session, error);
      return;
    }
    pending.catch((error: unknown) => this.evict(session, error));
  }

  private evict(session: SubscriberSession, error: unknown): void {
    const lists = this.unsubscribeAll(session);
    if (this.evicted.has(session)) return;
    this.evicted.add(session);

    console.warn(
      `[broadcast] Delivery to session ${session.id} failed, dropped from ${lists.length} list(s): ${errorMessage(error)}`,
    );
    this.emit('evicted', session, error);
  }
}
