/**
 * Session Manager - Scoped study state per MCP session
 *
 * Each session holds the loaded document, the last report and review,
 * the chat history and a community board. Stdio transport uses a default
 * "local" session.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/transports/session-manager
 */

import type { ExtractedFile } from '../../services/extraction/extractor.js';
import type { ChatMessage } from '../../services/llm/types.js';
import type { DocumentReview } from '../../services/summarization/review.js';
import type { SummaryReport } from '../../services/summarization/pipeline.js';
import { CommunityBoard } from '../../services/community/board.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface LoadedDocument {
  text: string;
  files: ExtractedFile[];
  loadedAt: number;
}

export interface StudySession {
  sessionId: string;
  document: LoadedDocument | null;
  report: SummaryReport | null;
  review: DocumentReview | null;
  chatHistory: ChatMessage[];
  board: CommunityBoard;
  createdAt: number;
  lastActivity: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION MANAGER
// ═══════════════════════════════════════════════════════════════════════════════

export class SessionManager {
  private sessions = new Map<string, StudySession>();
  static readonly LOCAL_SESSION_ID = 'local';

  /** Get or create session state */
  getSession(sessionId: string): StudySession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        sessionId,
        document: null,
        report: null,
        review: null,
        chatHistory: [],
        board: new CommunityBoard(),
        createdAt: Date.now(),
        lastActivity: Date.now(),
      };
      this.sessions.set(sessionId, session);
    }
    session.lastActivity = Date.now();
    return session;
  }

  /** Get the local (stdio) session */
  getLocalSession(): StudySession {
    return this.getSession(SessionManager.LOCAL_SESSION_ID);
  }

  /** Resolve the session for a tool call; calls without a transport session id share the local one */
  resolve(sessionId: string | undefined): StudySession {
    return sessionId ? this.getSession(sessionId) : this.getLocalSession();
  }

  /** Replace the loaded document; report, review and chat history belong to the old one */
  loadDocument(session: StudySession, text: string, files: ExtractedFile[]): LoadedDocument {
    session.document = { text, files, loadedAt: Date.now() };
    session.report = null;
    session.review = null;
    session.chatHistory = [];
    return session.document;
  }

  removeSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  /** Clean up expired sessions */
  cleanupExpired(ttlMs: number): number {
    const now = Date.now();
    let cleaned = 0;
    for (const [id, session] of this.sessions) {
      if (id !== SessionManager.LOCAL_SESSION_ID && now - session.lastActivity > ttlMs) {
        this.sessions.delete(id);
        cleaned++;
      }
    }
    return cleaned;
  }

  /** Drop every session (tests) */
  clear(): void {
    this.sessions.clear();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SINGLETON INSTANCE
// ═══════════════════════════════════════════════════════════════════════════════

export const sessionManager = new SessionManager();
