/**
 * Transport Layer Index
 *
 * @module server/transports
 */

export {
  SessionManager,
  sessionManager,
  type StudySession,
  type LoadedDocument,
} from './session-manager.js';
