/**
 * Unit tests for SessionManager
 *
 * @module tests/unit/server/session-manager
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { SessionManager } from '../../../src/server/transports/session-manager.js';

describe('SessionManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates a session on first access and returns the same one afterwards', () => {
    const manager = new SessionManager();
    const session = manager.getSession('abc');

    expect(session.sessionId).toBe('abc');
    expect(session.document).toBeNull();
    expect(session.chatHistory).toEqual([]);
    expect(session.board.size).toBe(0);
    expect(manager.getSession('abc')).toBe(session);
    expect(manager.getSessionCount()).toBe(1);
  });

  it('resolves calls without a session id to the local session', () => {
    const manager = new SessionManager();
    expect(manager.resolve(undefined).sessionId).toBe(SessionManager.LOCAL_SESSION_ID);
    expect(manager.resolve(undefined)).toBe(manager.getLocalSession());
    expect(manager.resolve('http-1').sessionId).toBe('http-1');
  });

  it('keeps sessions isolated', () => {
    const manager = new SessionManager();
    manager.getSession('a').board.createPost({ title: 'Only in a', content: 'x' });

    expect(manager.getSession('b').board.size).toBe(0);
  });

  it('clears report, review and chat history when a new document loads', () => {
    const manager = new SessionManager();
    const session = manager.getSession('s');
    session.chatHistory.push({ role: 'user', content: 'old question' });
    session.report = {
      status: 'complete',
      report: 'old',
      chunk_count: 1,
      partials: [],
      aggregated_by: 'openai',
      diagnostics: [],
    };
    session.review = { summary: 's', questions: 'q', corrections: 'c', diagnostics: [] };

    const loaded = manager.loadDocument(session, 'new text', []);

    expect(loaded.text).toBe('new text');
    expect(session.document).toBe(loaded);
    expect(session.report).toBeNull();
    expect(session.review).toBeNull();
    expect(session.chatHistory).toEqual([]);
  });

  it('keeps the board when a new document loads', () => {
    const manager = new SessionManager();
    const session = manager.getSession('s');
    session.board.createPost({ title: 'Kept', content: 'x' });

    manager.loadDocument(session, 'text', []);

    expect(session.board.size).toBe(1);
  });

  it('expires idle sessions but never the local one', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const manager = new SessionManager();
    manager.getLocalSession();
    manager.getSession('idle');

    vi.setSystemTime(new Date('2026-01-01T02:00:00Z'));
    manager.getSession('active');

    expect(manager.cleanupExpired(60 * 60 * 1000)).toBe(1);
    expect(manager.getSessionCount()).toBe(2);
  });

  it('removes one session or all of them', () => {
    const manager = new SessionManager();
    manager.getSession('a');
    manager.getSession('b');

    manager.removeSession('a');
    expect(manager.getSessionCount()).toBe(1);

    manager.clear();
    expect(manager.getSessionCount()).toBe(0);
  });
});
