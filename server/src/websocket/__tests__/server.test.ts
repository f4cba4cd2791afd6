import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { WebSocket, WebSocketServer } from 'ws';
import { CartSyncWSServer, WebSocketSession, type WSServerOptions } from '../server';
import { CartSyncClient, RequestTimeoutError } from '../../client/api';
import { ListStore } from '../../store/list-store';
import type { ListSummary, ShoppingList } from '../../types';
import { MemoryStorage } from '../../__tests__/memory-storage';

describe('CartSyncWSServer', () => {
  let store: ListStore;
  let server: CartSyncWSServer;
  let url: string;
  const clients: CartSyncClient[] = [];

  async function connect(): Promise<CartSyncClient> {
    const client = new CartSyncClient(url, { requestTimeoutMs: 2000 });
    clients.push(client);
    await client.connect();
    return client;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    store = await ListStore.open(new MemoryStorage());
    server = new CartSyncWSServer({ port: 0, host: '127.0.0.1', heartbeatIntervalMs: 0 }, store);
    const port = await server.ready();
    url = `ws://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) client.disconnect();
    await server.close();
    await store.close();
    vi.restoreAllMocks();
  });

  test('changes made by one client reach another client watching the list', async () => {
    const alice = await connect();
    const bob = await connect();
    await alice.createList('Groceries', 'groceries');

    const seen: (ShoppingList | null)[] = [];
    const initial = await bob.watchList('groceries', (list) => seen.push(list));
    expect(initial.revision).toBe(0);
    expect(initial.items).toEqual([]);

    await alice.addItem('groceries', 'milk');
    const eggs = await alice.addItem('groceries', 'eggs');
    await alice.updateItem('groceries', eggs.id, { checked: true });

    await vi.waitFor(() => expect(bob.getMirror('groceries')?.revision).toBe(3));
    expect(bob.getMirror('groceries')).toEqual(store.getSnapshot('groceries'));
    expect(seen.map((list) => list?.revision)).toEqual([1, 2, 3]);

    expect(await alice.clearChecked('groceries')).toBe(1);
    await vi.waitFor(() => expect(bob.getMirror('groceries')?.items.map((item) => item.text)).toEqual(['milk']));
  });

  test('errors come back as ListSyncError with their code', async () => {
    const alice = await connect();

    await expect(alice.removeItem('missing', 'nothing')).rejects.toMatchObject({
      name: 'ListSyncError',
      code: 'NotFound',
    });
    await expect(alice.createList('   ')).rejects.toMatchObject({ code: 'InvalidArgument' });
  });

  test('new connections are greeted with the current lists', async () => {
    await store.createList('Groceries', 'groceries');
    const client = new CartSyncClient(url);
    clients.push(client);
    const hello = new Promise<{ sessionId: string; lists: ListSummary[] }>((resolve) => {
      client.once('hello', resolve);
    });

    await client.connect();

    const greeting = await hello;
    expect(greeting.lists.map((list) => list.id)).toEqual(['groceries']);
    expect(await client.listLists()).toEqual(greeting.lists);
  });

  test('a deleted list ends the watch', async () => {
    const alice = await connect();
    const bob = await connect();
    await alice.createList('Groceries', 'groceries');
    const seen: (ShoppingList | null)[] = [];
    await bob.watchList('groceries', (list) => seen.push(list));

    await alice.deleteList('groceries');

    await vi.waitFor(() => expect(seen).toEqual([null]));
    expect(bob.getMirror('groceries')).toBeNull();
  });

  test('disconnecting drops the session', async () => {
    const alice = await connect();
    await alice.createList('Groceries', 'groceries');
    await alice.watchList('groceries', () => {});
    expect(server.connectionCount).toBe(1);

    alice.disconnect();

    await vi.waitFor(() => expect(server.connectionCount).toBe(0));
    await expect(alice.getList('groceries')).rejects.toMatchObject({ code: 'TransportFailure' });
  });
});

describe('CartSyncClient timeouts', () => {
  test('a request without a response times out with an unknown outcome', async () => {
    const silent = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    await new Promise<void>((resolve) => silent.once('listening', () => resolve()));
    const address = silent.address();
    const port = typeof address === 'string' ? 0 : address.port;

    const client = new CartSyncClient(`ws://127.0.0.1:${port}`, { requestTimeoutMs: 50 });
    await client.connect();

    const attempt = client.getList('groceries');
    await expect(attempt).rejects.toBeInstanceOf(RequestTimeoutError);
    await expect(attempt).rejects.toThrow('get_list got no response within 50ms; outcome unknown');

    client.disconnect();
    for (const socket of silent.clients) socket.terminate();
    await new Promise<void>((resolve, reject) => silent.close((error) => (error ? reject(error) : resolve())));
  });
});

describe('CartSyncWSServer transport limits', () => {
  let store: ListStore;
  let server: CartSyncWSServer | null = null;
  const clients: CartSyncClient[] = [];

  async function start(options: Omit<WSServerOptions, 'port' | 'host'>): Promise<string> {
    server = new CartSyncWSServer({ port: 0, host: '127.0.0.1', ...options }, store);
    const port = await server.ready();
    return `ws://127.0.0.1:${port}`;
  }

  function track(client: CartSyncClient): CartSyncClient {
    clients.push(client);
    return client;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    store = await ListStore.open(new MemoryStorage());
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    for (const client of clients.splice(0)) client.disconnect();
    await server?.close();
    server = null;
    await store.close();
  });

  test('a subscriber whose send buffer is over the limit is dropped', async () => {
    const url = await start({ heartbeatIntervalMs: 0, maxBufferedBytes: 1024 });
    const alice = track(new CartSyncClient(url));
    const bob = track(new CartSyncClient(url));
    const carol = track(new CartSyncClient(url));
    const bobHello = new Promise<{ sessionId: string }>((resolve) => bob.once('hello', resolve));
    await Promise.all([alice.connect(), bob.connect(), carol.connect()]);
    const { sessionId: stalled } = await bobHello;

    await alice.createList('Groceries', 'groceries');
    await bob.watchList('groceries', () => {});
    await carol.watchList('groceries', () => {});

    vi.spyOn(WebSocketSession.prototype, 'bufferedBytes', 'get').mockImplementation(function (
      this: WebSocketSession,
    ) {
      return this.id === stalled ? 4096 : 0;
    });

    await alice.addItem('groceries', 'milk');

    await vi.waitFor(() => expect(carol.getMirror('groceries')?.revision).toBe(1));
    await vi.waitFor(() => expect(bob.isConnected()).toBe(false));
    await vi.waitFor(() => expect(server?.connectionCount).toBe(2));
    expect(bob.getMirror('groceries')?.revision).toBe(0);

    await alice.addItem('groceries', 'eggs');
    await vi.waitFor(() => expect(carol.getMirror('groceries')?.items.map((item) => item.text)).toEqual(['milk', 'eggs']));
  });

  test('a session that stops answering pings is terminated', async () => {
    vi.spyOn(WebSocket.prototype, 'pong').mockImplementation(() => {});
    const url = await start({ heartbeatIntervalMs: 50 });
    const silent = track(new CartSyncClient(url));

    await silent.connect();
    expect(server?.connectionCount).toBe(1);

    await vi.waitFor(() => expect(server?.connectionCount).toBe(0));
    await vi.waitFor(() => expect(silent.isConnected()).toBe(false));
  });

  test('a session that answers pings stays connected', async () => {
    const url = await start({ heartbeatIntervalMs: 50 });
    const client = track(new CartSyncClient(url));
    await client.connect();

    await new Promise((resolve) => setTimeout(resolve, 250));

    expect(server?.connectionCount).toBe(1);
    expect(client.isConnected()).toBe(true);
  });
});
