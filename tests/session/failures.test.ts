import { describe, expect, test } from 'vitest';
import { CancelledError, ConfigurationError, InteractionError, NavigationError, SessionClosedError } from '../../src/errors.js';
import { classifyAutomationError } from '../../src/session/failures.js';

describe('classifyAutomationError', () => {
  test('maps typed errors onto failure kinds', () => {
    expect(classifyAutomationError(new NavigationError('timeout', { recoverable: true })).kind).toBe('navigation');
    expect(classifyAutomationError(new InteractionError('no box')).kind).toBe('interaction');
    expect(classifyAutomationError(new SessionClosedError()).kind).toBe('session-death');
    expect(classifyAutomationError(new CancelledError()).kind).toBe('cancelled');
    expect(classifyAutomationError(new ConfigurationError('bad')).kind).toBe('unexpected');
  });

  test('recognizes transport errors from a dead browser', () => {
    expect(classifyAutomationError(new Error('WebSocket is not open: readyState 3 (CLOSED)')).kind).toBe('session-death');
    expect(classifyAutomationError(new Error('connect ECONNREFUSED 127.0.0.1:9222')).kind).toBe('session-death');
    expect(classifyAutomationError(new Error('something else')).kind).toBe('unexpected');
  });

  test('gives untyped errors from a live page the kind of the step that raised them', () => {
    const failure = classifyAutomationError(new Error('Execution context was destroyed.'), true, 'interaction');
    expect(failure).toMatchObject({ kind: 'interaction', message: 'Execution context was destroyed.' });
    expect(classifyAutomationError(new Error('Cannot find context with specified id'), true, 'navigation').kind).toBe('navigation');
    expect(classifyAutomationError(new ConfigurationError('bad'), true, 'interaction').kind).toBe('unexpected');
    expect(classifyAutomationError(new Error('Execution context was destroyed.'), false, 'interaction').kind).toBe('session-death');
  });

  test('treats page failures on a dead session as session death', () => {
    const failure = classifyAutomationError(new NavigationError('timeout', { recoverable: true }), false);
    expect(failure.kind).toBe('session-death');
    expect(failure.message).toBe('timeout');
    expect(classifyAutomationError(new Error('odd'), false).kind).toBe('session-death');
    expect(classifyAutomationError(new CancelledError(), false).kind).toBe('cancelled');
  });
});
