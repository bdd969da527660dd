import { describe, expect, it } from 'vitest';
import { COMMANDS, initialSessionState, isCollectionCommand, transition } from './session.js';

describe('console session', () => {
  it('starts awaiting a mode', () => {
    expect(initialSessionState()).toEqual({ phase: 'AwaitingMode' });
  });

  it('offers every command in menu order', () => {
    expect(COMMANDS.map((c) => c.label)).toEqual(['List collections', 'Display info', 'Retrieve', 'RAG', 'Quit']);
  });

  it('quits from mode selection', () => {
    const next = transition(initialSessionState(), { type: 'modeSelected', command: 'Quit' });

    expect(next).toEqual({ phase: 'Done' });
  });

  it('lists collections without asking for one', () => {
    const next = transition(initialSessionState(), { type: 'modeSelected', command: 'ListCollections' });

    expect(next).toEqual({ phase: 'Executing', command: 'ListCollections' });
  });

  it('asks for a collection before a collection command', () => {
    const awaiting = transition(initialSessionState(), { type: 'modeSelected', command: 'Retrieve' });
    expect(awaiting).toEqual({ phase: 'AwaitingCollection', command: 'Retrieve' });

    const executing = transition(awaiting, { type: 'collectionSelected', collection: 'Sample' });
    expect(executing).toEqual({ phase: 'Executing', command: 'Retrieve', collection: 'Sample' });
  });

  it('skips collection selection in single-collection mode', () => {
    const next = transition(
      initialSessionState(),
      { type: 'modeSelected', command: 'AskRAG' },
      { fixedCollection: 'Sample' }
    );

    expect(next).toEqual({ phase: 'Executing', command: 'AskRAG', collection: 'Sample' });
  });

  it('returns to mode selection when collection selection is cancelled', () => {
    const next = transition({ phase: 'AwaitingCollection', command: 'ShowInfo' }, { type: 'cancelled' });

    expect(next).toEqual({ phase: 'AwaitingMode' });
  });

  it('continues or finishes after an action', () => {
    const executing = { phase: 'Executing', command: 'ShowInfo', collection: 'Sample' } as const;

    expect(transition(executing, { type: 'executed', continueSession: true })).toEqual({ phase: 'AwaitingMode' });
    expect(transition(executing, { type: 'executed', continueSession: false })).toEqual({ phase: 'Done' });
  });

  it('rejects events that do not fit the phase', () => {
    expect(() => transition({ phase: 'Done' }, { type: 'cancelled' })).toThrow(
      'Unexpected event "cancelled" in phase Done'
    );
    expect(() => transition(initialSessionState(), { type: 'collectionSelected', collection: 'Sample' })).toThrow(
      'Unexpected event "collectionSelected" in phase AwaitingMode'
    );
  });

  it('tells collection commands apart', () => {
    expect(isCollectionCommand('Retrieve')).toBe(true);
    expect(isCollectionCommand('ListCollections')).toBe(false);
    expect(isCollectionCommand('Quit')).toBe(false);
  });
});
