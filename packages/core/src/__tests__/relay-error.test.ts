import { describe, expect, it } from 'vitest';
import {
  CoordinatorClosedError,
  DatabaseNotInitializedError,
  QueryExecutionError,
  QueryTimeoutError,
  RelayError,
  errorFromWireText,
  errorMessage,
  getErrorCategory,
} from '../errors/index.js';

describe('RelayError', () => {
  it('should use the default message for a code', () => {
    const error = new RelayError({ code: 'RELAY_T300', context: { queryId: 'q-1' } });
    expect(error.message).toBe('Query timeout');
    expect(error.category).toBe('timeout');
    expect(error.context).toEqual({ queryId: 'q-1' });
  });

  it('should keep protocol text for the well-known failures', () => {
    expect(new DatabaseNotInitializedError().message).toBe('Database not initialized');
    expect(new QueryTimeoutError().message).toBe('Query timeout');
    expect(new CoordinatorClosedError().message).toBe('Coordinator closed');
  });

  it('should keep engine text verbatim for execution errors', () => {
    const error = new QueryExecutionError('near "SELCT": syntax error');
    expect(error.message).toBe('near "SELCT": syntax error');
    expect(error.code).toBe('RELAY_Q200');
    expect(error.name).toBe('QueryExecutionError');
    expect(error).toBeInstanceOf(RelayError);
  });

  it('should match codes', () => {
    const error = new QueryTimeoutError();
    expect(RelayError.isCode(error, 'RELAY_T300')).toBe(true);
    expect(RelayError.isCode(error, 'RELAY_I100')).toBe(false);
    expect(RelayError.isRelayError(new Error('plain'))).toBe(false);
  });

  it('should carry suggestion, context and cause', () => {
    const cause = new Error('disk full');
    const error = new RelayError({ code: 'RELAY_I101', message: 'disk full', context: { a: 1 }, cause });
    expect(error.suggestion).toBe('Ensure the SQLite engine can be loaded in this context.');
    expect(error.category).toBe('initialization');
    expect(error.context).toEqual({ a: 1 });
    expect(error.cause).toBe(cause);
  });

  it('should categorize every code family', () => {
    expect(getErrorCategory('RELAY_I100')).toBe('initialization');
    expect(getErrorCategory('RELAY_Q200')).toBe('query');
    expect(getErrorCategory('RELAY_T300')).toBe('timeout');
    expect(getErrorCategory('RELAY_L400')).toBe('lock');
    expect(getErrorCategory('RELAY_X901')).toBe('lifecycle');
  });
});

describe('error helpers', () => {
  it('should rebuild the not-initialized error from wire text', () => {
    const error = errorFromWireText('Database not initialized');
    expect(error).toBeInstanceOf(DatabaseNotInitializedError);
  });

  it('should rebuild any other wire text as an execution error', () => {
    const error = errorFromWireText('no such table: todos', { queryId: 'q-2' });
    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error.message).toBe('no such table: todos');
    expect(error.context).toEqual({ queryId: 'q-2' });
  });

  it('should extract text from thrown values', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('worse')).toBe('worse');
  });
});
