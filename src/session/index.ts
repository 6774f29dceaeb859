/**
 * Session - one conversation and everything it owns
 */

export { ChatSession, createLogger, type ChatSessionDeps, type ServerConnectionFailure } from './chat-session.js';
