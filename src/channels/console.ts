import { confirm, input, select } from '@inquirer/prompts';
import type { CollectionService } from '../collections/service.js';
import type { RAGChain } from '../rag/chain.js';
import {
  COMMANDS,
  initialSessionState,
  transition,
  type Command,
  type CollectionCommand,
  type SessionOptions,
  type SessionState,
} from './session.js';
import {
  formatCollectionInfo,
  formatError,
  formatRetrievalResult,
  formatStats,
} from './format.js';

export interface ConsoleChannelOptions extends SessionOptions {
  /** Query taken from the command line, used for Retrieve instead of prompting */
  initialQuery?: string;
  persistDir: string;
}

/**
 * Interactive console over the collection service.
 */
export class ConsoleChannel {
  readonly name = 'console';

  private service: CollectionService;
  private options: ConsoleChannelOptions;
  private state: SessionState = initialSessionState();

  constructor(service: CollectionService, options: ConsoleChannelOptions) {
    this.service = service;
    this.options = options;
  }

  async run(): Promise<void> {
    console.log('\n📚 Document Collections Console');
    if (this.options.fixedCollection) {
      console.log(`Using collection: ${this.options.fixedCollection}`);
    }

    while (this.state.phase !== 'Done') {
      try {
        await this.step(this.state);
      } catch (error) {
        // Ctrl+C inside a prompt
        if (error instanceof Error && error.name === 'ExitPromptError') {
          this.state = { phase: 'Done' };
          break;
        }
        throw error;
      }
    }

    console.log('Exiting.');
  }

  private async step(state: SessionState): Promise<void> {
    switch (state.phase) {
      case 'AwaitingMode': {
        const command = await select<Command>({
          message: 'Choose mode:',
          choices: COMMANDS.map(({ command, label }) => ({ name: label, value: command })),
        });
        this.state = transition(state, { type: 'modeSelected', command }, this.options);
        return;
      }

      case 'AwaitingCollection': {
        const collections = this.service.listRegistered();
        if (collections.length === 0) {
          console.log('\n⚠️  No collections registered. Add them to the collections file.\n');
          this.state = transition(state, { type: 'cancelled' });
          return;
        }

        const collection = await select<string>({
          message: 'Select collection:',
          choices: collections.map((c) => ({
            name: c.sourceDocument ? `${c.name} (${c.sourceDocument})` : c.name,
            value: c.name,
          })),
        });
        this.state = transition(state, { type: 'collectionSelected', collection });
        return;
      }

      case 'Executing': {
        const askToContinue =
          state.command === 'ListCollections'
            ? await this.listCollections()
            : await this.execute(state.command, state.collection);

        const continueSession = askToContinue
          ? await confirm({ message: 'Do you want to perform another action?', default: false })
          : true;
        this.state = transition(state, { type: 'executed', continueSession });
        return;
      }

      case 'Done':
        return;
    }
  }

  /**
   * Returns false when the session should go straight back to mode selection.
   */
  private async listCollections(): Promise<boolean> {
    try {
      const stats = await this.service.listAll();
      console.log(`\n${formatStats(stats, this.options.persistDir)}\n`);
    } catch (error) {
      this.printError(error);
    }
    return false;
  }

  private async execute(command: CollectionCommand, collection: string): Promise<boolean> {
    switch (command) {
      case 'ShowInfo':
        try {
          const info = await this.service.info(collection);
          console.log(`\n${formatCollectionInfo(info)}\n`);
        } catch (error) {
          this.printError(error);
        }
        return true;

      case 'Retrieve': {
        const query = this.options.initialQuery || (await input({ message: 'Enter your query:' }));
        if (!query.trim()) {
          console.log('No query provided. Continuing.');
          return false;
        }
        try {
          const result = await this.service.retrieve(collection, query);
          console.log(`\n${formatRetrievalResult(result)}\n`);
        } catch (error) {
          this.printError(error);
        }
        return true;
      }

      case 'AskRAG': {
        let chain: RAGChain;
        try {
          chain = await this.service.createChain(collection);
        } catch (error) {
          this.printError(error);
          return false;
        }

        const question = (await input({ message: 'Enter your RAG question:' })).trim();
        if (!question) {
          console.log('No question provided. Continuing.');
          return false;
        }
        try {
          const { answer } = await chain.ask(question);
          console.log(`\nAnswer:\n${answer}\n`);
        } catch (error) {
          this.printError(error);
        }
        return true;
      }
    }
  }

  private printError(error: unknown): void {
    console.log(`\n❌ Error: ${formatError(error)}\n`);
  }
}
