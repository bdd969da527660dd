/**
 * Console Session State Machine
 *
 * AwaitingMode -> AwaitingCollection -> Executing -> AwaitingMode
 * All prompting happens outside; this only decides what comes next.
 */

export type Command = 'ListCollections' | 'ShowInfo' | 'Retrieve' | 'AskRAG' | 'Quit';

/** Commands that act on a single collection */
export type CollectionCommand = 'ShowInfo' | 'Retrieve' | 'AskRAG';

export const COMMANDS: ReadonlyArray<{ command: Command; label: string }> = [
  { command: 'ListCollections', label: 'List collections' },
  { command: 'ShowInfo', label: 'Display info' },
  { command: 'Retrieve', label: 'Retrieve' },
  { command: 'AskRAG', label: 'RAG' },
  { command: 'Quit', label: 'Quit' },
];

export type SessionState =
  | { phase: 'AwaitingMode' }
  | { phase: 'AwaitingCollection'; command: CollectionCommand }
  | { phase: 'Executing'; command: 'ListCollections' }
  | { phase: 'Executing'; command: CollectionCommand; collection: string }
  | { phase: 'Done' };

export type SessionEvent =
  | { type: 'modeSelected'; command: Command }
  | { type: 'collectionSelected'; collection: string }
  | { type: 'cancelled' }
  | { type: 'executed'; continueSession: boolean };

export interface SessionOptions {
  /** Single-collection mode: skip collection selection */
  fixedCollection?: string;
}

export function initialSessionState(): SessionState {
  return { phase: 'AwaitingMode' };
}

export function isCollectionCommand(command: Command): command is CollectionCommand {
  return command === 'ShowInfo' || command === 'Retrieve' || command === 'AskRAG';
}

export function transition(
  state: SessionState,
  event: SessionEvent,
  options: SessionOptions = {}
): SessionState {
  switch (state.phase) {
    case 'AwaitingMode':
      if (event.type !== 'modeSelected') break;
      if (event.command === 'Quit') {
        return { phase: 'Done' };
      }
      if (event.command === 'ListCollections') {
        return { phase: 'Executing', command: 'ListCollections' };
      }
      if (options.fixedCollection) {
        return { phase: 'Executing', command: event.command, collection: options.fixedCollection };
      }
      return { phase: 'AwaitingCollection', command: event.command };

    case 'AwaitingCollection':
      if (event.type === 'cancelled') {
        return { phase: 'AwaitingMode' };
      }
      if (event.type !== 'collectionSelected') break;
      return { phase: 'Executing', command: state.command, collection: event.collection };

    case 'Executing':
      if (event.type !== 'executed') break;
      return event.continueSession ? { phase: 'AwaitingMode' } : { phase: 'Done' };

    case 'Done':
      break;
  }

  throw new Error(`Unexpected event "${event.type}" in phase ${state.phase}`);
}
