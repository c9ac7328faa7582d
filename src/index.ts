export * from './errors.js';
export * from './inMemory.js';
export * from './types.js';

// shared engine
export * from './shared/boundedQueue.js';
export * from './shared/bridge.js';
export * from './shared/dispatch.js';
export * from './shared/eventStream.js';
export * from './shared/events.js';
export * from './shared/interceptors.js';
export * from './shared/lifecycle.js';
export * from './shared/logger.js';
export * from './shared/message.js';
export * from './shared/middleware.js';
export * from './shared/pendingRequests.js';
export * from './shared/session.js';
export * from './shared/stdio.js';
export * from './shared/transport.js';

// server role and transports
export * from './server/config.js';
export * from './server/express.js';
export * from './server/http.js';
export * from './server/server.js';
export * from './server/sse.js';
export * from './server/stdio.js';

// client role and transports
export * from './client/client.js';
export * from './client/http.js';
export * from './client/reconnect.js';
export * from './client/sse.js';
export * from './client/stdio.js';
