import { describe, it, expect } from 'vitest';
import { parseCommand } from '../src/services/commands.js';

describe('Command parser', () => {
  it('parses resolved with a record id', () => {
    expect(parseCommand('resolved rec_abc-123')).toEqual({ type: 'resolved', externalRecordId: 'rec_abc-123' });
    expect(parseCommand('  !RESOLVED   rec_1 ')).toEqual({ type: 'resolved', externalRecordId: 'rec_1' });
  });

  it('parses status and pending with an optional prefix', () => {
    expect(parseCommand('/status')).toEqual({ type: 'status' });
    expect(parseCommand('Pending')).toEqual({ type: 'pending' });
  });

  it('rejects malformed commands', () => {
    expect(parseCommand('resolved')).toEqual({ type: 'unrecognized', text: 'resolved' });
    expect(parseCommand('resolved a b')).toEqual({ type: 'unrecognized', text: 'resolved a b' });
    expect(parseCommand('resolved rec$1')).toEqual({ type: 'unrecognized', text: 'resolved rec$1' });
    expect(parseCommand('status now')).toEqual({ type: 'unrecognized', text: 'status now' });
    expect(parseCommand('hello there')).toEqual({ type: 'unrecognized', text: 'hello there' });
    expect(parseCommand('')).toEqual({ type: 'unrecognized', text: '' });
  });
});
