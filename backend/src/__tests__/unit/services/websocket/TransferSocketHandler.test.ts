/**
 * TransferSocketHandler Unit Tests
 *
 * Subscribe/unsubscribe against a fake socket that records room changes.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Server as SocketIOServer, Socket } from 'socket.io';
import { AdminRegistry, InMemoryAdminStore } from '@/domains/admins';
import {
  attachTransferSocketHandlers,
  authenticateTransferSocket,
  getSocketCallerHandle,
  registerTransferHandlers,
} from '@/services/websocket';
import { flushAsync } from '../../../fixtures/TransferFixture';

vi.mock('@/shared/utils/logger', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  })),
}));

type Listener = (...args: unknown[]) => void;

interface FakeHandshake {
  headers?: Record<string, string>;
  auth?: Record<string, unknown>;
}

function createFakeSocket(handshake: FakeHandshake = { headers: { 'x-user-handle': '@owner' } }) {
  const listeners = new Map<string, Listener>();
  const join = vi.fn().mockResolvedValue(undefined);
  const leave = vi.fn().mockResolvedValue(undefined);
  const socket = {
    id: 'socket-1',
    handshake: { headers: handshake.headers ?? {}, auth: handshake.auth ?? {} },
    on: vi.fn((event: string, listener: Listener) => {
      listeners.set(event, listener);
    }),
    join,
    leave,
  };

  return {
    socket: socket as unknown as Socket,
    join,
    leave,
    trigger(event: string, ...args: unknown[]): void {
      const listener = listeners.get(event);
      if (!listener) throw new Error(`No listener for ${event}`);
      listener(...args);
    },
    events: () => [...listeners.keys()],
  };
}

describe('TransferSocketHandler', () => {
  let admins: AdminRegistry;
  let fake: ReturnType<typeof createFakeSocket>;

  beforeEach(() => {
    admins = new AdminRegistry({ permanentAdmins: ['@owner'], store: new InMemoryAdminStore() });
    fake = createFakeSocket();
    registerTransferHandlers(fake.socket, { admins });
  });

  it('joins the status room and acknowledges', async () => {
    const ack = vi.fn();

    fake.trigger('transfer:subscribe', { statusHandle: 'ops-room' }, ack);
    await flushAsync();

    expect(fake.join).toHaveBeenCalledWith('status:ops-room');
    expect(ack).toHaveBeenCalledWith({ success: true });
  });

  it('leaves the status room on unsubscribe', async () => {
    const ack = vi.fn();

    fake.trigger('transfer:unsubscribe', { statusHandle: 'ops-room' }, ack);
    await flushAsync();

    expect(fake.leave).toHaveBeenCalledWith('status:ops-room');
    expect(ack).toHaveBeenCalledWith({ success: true });
  });

  it('rejects an invalid status handle', async () => {
    const ack = vi.fn();

    fake.trigger('transfer:subscribe', { statusHandle: '' }, ack);
    await flushAsync();

    expect(fake.join).not.toHaveBeenCalled();
    expect(ack).toHaveBeenCalledWith({
      success: false,
      error: 'statusHandle: Status handle cannot be empty',
    });
  });

  it('reports a failed join through the ack', async () => {
    fake.join.mockRejectedValue(new Error('adapter down'));
    const ack = vi.fn();

    fake.trigger('transfer:subscribe', { statusHandle: 'ops-room' }, ack);
    await flushAsync();

    expect(ack).toHaveBeenCalledWith({ success: false, error: 'adapter down' });
  });

  it('works without an ack callback', async () => {
    fake.trigger('transfer:subscribe', { statusHandle: 'ops-room' });
    await flushAsync();

    expect(fake.join).toHaveBeenCalledWith('status:ops-room');
  });

  describe('subscription access', () => {
    it('refuses another handle to a caller who is not an admin', async () => {
      const stranger = createFakeSocket({ headers: { 'x-user-handle': '@stranger' } });
      registerTransferHandlers(stranger.socket, { admins });
      const ack = vi.fn();

      stranger.trigger('transfer:subscribe', { statusHandle: 'owner' }, ack);
      await flushAsync();

      expect(stranger.join).not.toHaveBeenCalled();
      expect(ack).toHaveBeenCalledWith({ success: false, error: 'Access denied' });
    });

    it("lets a caller who is not an admin follow their own default handle", async () => {
      const member = createFakeSocket({ auth: { userHandle: 'first.last' } });
      registerTransferHandlers(member.socket, { admins });
      const ack = vi.fn();

      member.trigger('transfer:subscribe', { statusHandle: 'first_last' }, ack);
      await flushAsync();

      expect(member.join).toHaveBeenCalledWith('status:first_last');
      expect(ack).toHaveBeenCalledWith({ success: true });
    });

    it('follows handles for admins added at runtime', async () => {
      await admins.addAdmin('@helper');
      const helper = createFakeSocket({ headers: { 'x-user-handle': 'helper' } });
      registerTransferHandlers(helper.socket, { admins });
      const ack = vi.fn();

      helper.trigger('transfer:subscribe', { statusHandle: 'owner' }, ack);
      await flushAsync();

      expect(helper.join).toHaveBeenCalledWith('status:owner');
    });

    it('refuses subscriptions from a socket without identity', async () => {
      const anonymous = createFakeSocket({});
      registerTransferHandlers(anonymous.socket, { admins });
      const ack = vi.fn();

      anonymous.trigger('transfer:subscribe', { statusHandle: 'owner' }, ack);
      await flushAsync();

      expect(anonymous.join).not.toHaveBeenCalled();
      expect(ack).toHaveBeenCalledWith({ success: false, error: 'Caller identity is missing' });
    });
  });
});

describe('socket identity', () => {
  it('reads the handle from the header before the auth payload', () => {
    const both = createFakeSocket({ headers: { 'x-user-handle': ' alice ' }, auth: { userHandle: '@bob' } });
    const authOnly = createFakeSocket({ auth: { userHandle: '@bob' } });

    expect(getSocketCallerHandle(both.socket)).toBe('@alice');
    expect(getSocketCallerHandle(authOnly.socket)).toBe('@bob');
    expect(getSocketCallerHandle(createFakeSocket({ auth: { userHandle: 42 } }).socket)).toBeNull();
  });

  it('refuses connections without a caller handle', () => {
    const next = vi.fn();

    authenticateTransferSocket(createFakeSocket({ headers: { 'x-user-handle': '  ' } }).socket, next);

    expect(next).toHaveBeenCalledWith(new Error('Caller identity is missing'));
  });

  it('accepts connections that carry a caller handle', () => {
    const next = vi.fn();

    authenticateTransferSocket(createFakeSocket().socket, next);

    expect(next).toHaveBeenCalledWith();
  });

  it('authenticates and registers handlers for each new connection', () => {
    const serverListeners = new Map<string, Listener>();
    const use = vi.fn();
    const io = {
      use,
      on: vi.fn((event: string, listener: Listener) => {
        serverListeners.set(event, listener);
      }),
    } as unknown as SocketIOServer;
    const connected = createFakeSocket();

    attachTransferSocketHandlers(io, {
      admins: new AdminRegistry({ permanentAdmins: [], store: new InMemoryAdminStore() }),
    });
    serverListeners.get('connection')?.(connected.socket);

    expect(use).toHaveBeenCalledWith(authenticateTransferSocket);
    expect(connected.events()).toEqual(['transfer:subscribe', 'transfer:unsubscribe', 'disconnect']);
  });
});
