/**
 * Command-line registry: maps command names typed on the command line to
 * handler functions.
 *
 * A command line is split on whitespace; the first word selects the
 * handler, the rest are its arguments.
 */

/**
 * What command-line handlers can do to the editor. Provided by EditorCore
 * when executing a line.
 */
export interface CommandLineHost {
  quit(): void;
  forceQuit(): void;
  setTabStop(tabStop: number): void;
  setIndentWithSpaces(enabled: boolean): void;
  info(message: string): void;
  error(message: string): void;
}

export type CommandLineHandler = (args: readonly string[], host: CommandLineHost) => void;

export class CommandRegistry {
  private commands: Map<string, CommandLineHandler> = new Map();

  register(name: string, handler: CommandLineHandler): void {
    this.commands.set(name, handler);
  }

  /**
   * Parse and run a command line.
   * @returns true when a handler ran.
   */
  execute(line: string, host: CommandLineHost): boolean {
    const words = line.trim().split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
      host.error('empty command');
      return false;
    }

    const [name, ...args] = words;
    const handler = this.commands.get(name);
    if (!handler) {
      host.error(`unknown command '${name}'`);
      return false;
    }
    handler(args, host);
    return true;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  getAll(): string[] {
    return [...this.commands.keys()];
  }
}

function runExit(args: readonly string[], host: CommandLineHost): void {
  if (args.length === 0) {
    host.quit();
  } else if (args[0] === '--force') {
    host.forceQuit();
  } else {
    host.error('exit: unknown extra arguments');
  }
}

function runSet(args: readonly string[], host: CommandLineHost): void {
  if (args.length === 0) {
    host.error('set: missing option');
    return;
  }
  const option = args[0];
  const value = args.length > 1 ? args[1] : '';

  switch (option) {
    case 'tabstop': {
      const tabStop = Number(value);
      if (value === '' || !Number.isInteger(tabStop) || tabStop < 1) {
        host.error(`set: invalid tab stop '${value}'`);
        return;
      }
      host.setTabStop(tabStop);
      host.info(`tabstop=${tabStop}`);
      return;
    }
    case 'indent':
      if (value === 'spaces' || value === 'tabs') {
        host.setIndentWithSpaces(value === 'spaces');
        host.info(`indent=${value}`);
      } else {
        host.error(`set: invalid indent '${value}'`);
      }
      return;
    default:
      host.error(`set: unknown option '${option}'`);
  }
}

/** Register the built-in command-line commands. */
export function registerBuiltinCommands(registry: CommandRegistry): void {
  registry.register('exit', runExit);
  registry.register('set', runSet);
}
