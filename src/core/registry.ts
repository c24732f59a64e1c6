import { EXIT_CODES } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

/** Runs a target and resolves to its process exit status. */
export type CommandAction = () => Promise<number>;

export interface CommandEntry {
  readonly name: string;
  readonly description: string;
  readonly action: CommandAction;
}

export interface CommandListing {
  readonly name: string;
  readonly description: string;
}

/** Read-only view handed to the dispatcher once construction is done. */
export interface ReadonlyRegistry {
  readonly size: number;
  list(): IterableIterator<CommandListing>;
  resolve(name: string): CommandAction;
  has(name: string): boolean;
}

// ── Errors ───────────────────────────────────────────────────

export class DuplicateNameError extends Error {
  constructor(readonly commandName: string) {
    super(`Target "${commandName}" is already registered`);
    this.name = 'DuplicateNameError';
  }
}

export class RegistrySealedError extends Error {
  constructor(readonly commandName: string) {
    super(`Cannot register "${commandName}": registry is sealed`);
    this.name = 'RegistrySealedError';
  }
}

export class UnknownCommandError extends Error {
  readonly exitCode = EXIT_CODES.FAILURE;

  constructor(readonly commandName: string) {
    super(`Unknown target "${commandName}"`);
    this.name = 'UnknownCommandError';
  }
}

// ── Registry ─────────────────────────────────────────────────

/**
 * Ordered name → (description, action) table.
 * Map preserves insertion order, which keeps help output deterministic.
 */
export class CommandRegistry implements ReadonlyRegistry {
  private readonly entries = new Map<string, CommandEntry>();
  private sealed = false;

  register(name: string, description: string, action: CommandAction): this {
    if (this.sealed) {
      throw new RegistrySealedError(name);
    }
    if (name.length === 0) {
      throw new Error('Target name must not be empty');
    }
    if (this.entries.has(name)) {
      throw new DuplicateNameError(name);
    }
    this.entries.set(name, { name, description, action });
    return this;
  }

  get size(): number {
    return this.entries.size;
  }

  *list(): IterableIterator<CommandListing> {
    for (const { name, description } of this.entries.values()) {
      yield { name, description };
    }
  }

  resolve(name: string): CommandAction {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      throw new UnknownCommandError(name);
    }
    return entry.action;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  seal(): ReadonlyRegistry {
    this.sealed = true;
    return this;
  }
}
