/**
 * WebSocket services
 * @module services/websocket
 */
export * from './SocketService';
export * from './SocketStatusChannel';
export * from './TransferSocketHandler';
