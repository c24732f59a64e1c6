import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { MemorySink } from '../utils/memorySink.js';
import { Dispatcher } from './dispatcher.js';
import { runHelp } from './help.js';
import { CommandRegistry } from './registry.js';

describe('Dispatcher', () => {
  let stderr: MockInstance;

  beforeEach(() => {
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function setup() {
    const out = new MemorySink();
    const registry = new CommandRegistry();
    const help = vi.fn(() => runHelp(registry, out));
    const check = vi.fn(async () => 7);
    registry
      .register('help', 'Display this help message.', help)
      .register('check', 'Runs a request including headers to our server', check);
    const dispatcher = new Dispatcher(registry.seal(), { out });
    return { out, help, check, dispatcher };
  }

  it('runs exactly the action bound to the name and returns its status', async () => {
    const { help, check, dispatcher } = setup();

    const code = await dispatcher.dispatch(['check']);

    expect(code).toBe(7);
    expect(check).toHaveBeenCalledOnce();
    expect(help).not.toHaveBeenCalled();
  });

  it('reports an unknown target on stderr without running anything', async () => {
    const { out, help, check, dispatcher } = setup();

    const code = await dispatcher.dispatch(['deploy']);

    expect(code).toBe(1);
    expect(help).not.toHaveBeenCalled();
    expect(check).not.toHaveBeenCalled();
    expect(out.text()).toBe('');
    expect(stderr).toHaveBeenCalledWith(
      '💥 Unknown target "deploy". Run "taskrun help" to list available targets.\n',
    );
  });

  it('uses the configured program name in the usage hint', async () => {
    const dispatcher = new Dispatcher(new CommandRegistry().seal(), {
      programName: 'make',
      out: new MemorySink(),
    });

    await dispatcher.dispatch(['curl']);

    expect(stderr).toHaveBeenCalledWith(
      '💥 Unknown target "curl". Run "make help" to list available targets.\n',
    );
  });

  it('treats an empty argv the same as "help"', async () => {
    const empty = setup();
    const explicit = setup();

    const emptyCode = await empty.dispatcher.dispatch([]);
    const explicitCode = await explicit.dispatcher.dispatch(['help']);

    expect(emptyCode).toBe(0);
    expect(explicitCode).toBe(0);
    expect(empty.help).toHaveBeenCalledOnce();
    expect(explicit.help).toHaveBeenCalledOnce();
    expect(empty.out.text()).toBe(explicit.out.text());
    expect(empty.out.text()).toBe(
      'Available targets:\n' +
        '  - help: Display this help message.\n' +
        '  - check: Runs a request including headers to our server.\n',
    );
  });

  it('returns 0 for help even if the help action reports otherwise', async () => {
    const registry = new CommandRegistry().register('help', 'Help', async () => 5);

    expect(await new Dispatcher(registry.seal()).dispatch(['help'])).toBe(0);
  });

  it('falls back to the built-in listing when no help target is registered', async () => {
    const out = new MemorySink();
    const registry = new CommandRegistry().register('check', 'Probe', async () => 0);

    const code = await new Dispatcher(registry.seal(), { out }).dispatch([]);

    expect(code).toBe(0);
    expect(out.text()).toBe('Available targets:\n  - check: Probe.\n');
  });

  it('ignores extra arguments with a warning', async () => {
    const { check, dispatcher } = setup();

    const code = await dispatcher.dispatch(['check', '--verbose', 'now']);

    expect(code).toBe(7);
    expect(check).toHaveBeenCalledOnce();
    expect(stderr).toHaveBeenCalledWith('⚠️  Ignoring extra arguments: --verbose now\n');
  });

  it('turns a throwing action into status 1 with a message', async () => {
    const registry = new CommandRegistry().register('boom', 'Explodes', async () => {
      throw new Error('kaput');
    });

    const code = await new Dispatcher(registry.seal()).dispatch(['boom']);

    expect(code).toBe(1);
    expect(stderr).toHaveBeenCalledWith('💥 Target "boom" failed: kaput\n');
  });

  it('reports a throwing help action instead of rejecting', async () => {
    const registry = new CommandRegistry().register('help', 'Help', async () => {
      throw new Error('listing unavailable');
    });

    const code = await new Dispatcher(registry.seal()).dispatch([]);

    expect(code).toBe(1);
    expect(stderr).toHaveBeenCalledWith('💥 Target "help" failed: listing unavailable\n');
  });
});
