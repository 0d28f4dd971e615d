/**
 * Transfer Socket Handler
 *
 * Lets clients follow a status handle: `transfer:subscribe` joins the
 * handle's room, `transfer:unsubscribe` leaves it. Both acknowledge with
 * `{ success, error? }` when the client passes a callback.
 *
 * Connections carry the caller handle like HTTP requests do, in the
 * `X-User-Handle` handshake header (or `auth.userHandle` for browser
 * clients). Admins may follow any handle; other callers only their own
 * default status handle.
 *
 * @module services/websocket/TransferSocketHandler
 */

import type { Server, Socket } from 'socket.io';
import {
  ErrorCode,
  TRANSFER_WS_EVENTS,
  defaultStatusHandle,
  formatFirstIssue,
  getErrorMessage,
  getStatusRoom,
  normalizeUserHandle,
  transferSubscriptionSchema,
} from '@blob-relay/shared';
import { getAdminRegistry, type AdminRegistry } from '@/domains/admins';
import { USER_HANDLE_HEADER } from '@/middleware/admin-auth';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'TransferSocketHandler' });

export interface TransferSocketDependencies {
  admins?: AdminRegistry;
}

export interface SubscriptionAck {
  success: boolean;
  error?: string;
}

type AckCallback = (ack: SubscriptionAck) => void;

function toAck(callback: unknown): AckCallback | undefined {
  if (typeof callback !== 'function') {
    return undefined;
  }
  const fn = callback;
  return (ack: SubscriptionAck) => {
    fn(ack);
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalized caller handle from the handshake, or null when absent
 */
export function getSocketCallerHandle(socket: Socket): string | null {
  const header = socket.handshake.headers[USER_HANDLE_HEADER];
  const fromAuth: unknown = socket.handshake.auth['userHandle'];
  const raw = typeof header === 'string' ? header : typeof fromAuth === 'string' ? fromAuth : '';
  const handle = normalizeUserHandle(raw);
  return handle || null;
}

/**
 * Socket.IO middleware: refuse connections without a caller identity
 */
export function authenticateTransferSocket(socket: Socket, next: (err?: Error) => void): void {
  if (!getSocketCallerHandle(socket)) {
    logger.warn({ socketId: socket.id }, 'Connection rejected: no caller identity');
    next(new Error(getErrorMessage(ErrorCode.UNAUTHORIZED)));
    return;
  }
  next();
}

async function mayFollow(admins: AdminRegistry, caller: string, statusHandle: string): Promise<boolean> {
  if (statusHandle === defaultStatusHandle(caller)) {
    return true;
  }
  return admins.isAdmin(caller);
}

type Membership = 'join' | 'leave';

async function changeMembership(
  socket: Socket,
  admins: AdminRegistry,
  action: Membership,
  data: unknown,
  ack: AckCallback | undefined
): Promise<void> {
  const caller = getSocketCallerHandle(socket);
  if (!caller) {
    ack?.({ success: false, error: getErrorMessage(ErrorCode.UNAUTHORIZED) });
    return;
  }

  const parsed = transferSubscriptionSchema.safeParse(data);
  if (!parsed.success) {
    ack?.({ success: false, error: formatFirstIssue(parsed.error) });
    return;
  }

  const room = getStatusRoom(parsed.data.statusHandle);
  try {
    if (action === 'join') {
      if (!(await mayFollow(admins, caller, parsed.data.statusHandle))) {
        logger.warn({ socketId: socket.id, caller, room }, 'Status subscription refused');
        ack?.({ success: false, error: getErrorMessage(ErrorCode.FORBIDDEN) });
        return;
      }
      await socket.join(room);
    } else {
      await socket.leave(room);
    }
    logger.debug({ socketId: socket.id, caller, room, action }, 'Status subscription changed');
    ack?.({ success: true });
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ socketId: socket.id, room, action, error: message }, 'Status subscription failed');
    ack?.({ success: false, error: message });
  }
}

/**
 * Register subscription handlers on one connected socket
 */
export function registerTransferHandlers(socket: Socket, deps: TransferSocketDependencies = {}): void {
  const admins = deps.admins ?? getAdminRegistry();

  socket.on(TRANSFER_WS_EVENTS.SUBSCRIBE, (data: unknown, callback?: unknown) => {
    void changeMembership(socket, admins, 'join', data, toAck(callback));
  });

  socket.on(TRANSFER_WS_EVENTS.UNSUBSCRIBE, (data: unknown, callback?: unknown) => {
    void changeMembership(socket, admins, 'leave', data, toAck(callback));
  });
}

/**
 * Authenticate connections and wire the handlers for each of them
 */
export function attachTransferSocketHandlers(io: Server, deps: TransferSocketDependencies = {}): void {
  io.use(authenticateTransferSocket);
  io.on('connection', (socket: Socket) => {
    logger.debug({ socketId: socket.id, caller: getSocketCallerHandle(socket) }, 'Socket connected');
    registerTransferHandlers(socket, deps);
    socket.on('disconnect', (reason: string) => {
      logger.debug({ socketId: socket.id, reason }, 'Socket disconnected');
    });
  });
}
