import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { CommanderError } from 'commander';
import { createProgram, type CliOptions } from '../../src/cli/program.js';

function argv(...args: string[]): string[] {
  return ['node', 'dutyscdp-bot', ...args];
}

type Action = (opts: CliOptions, extra: readonly string[]) => Promise<void>;

describe('createProgram', () => {
  let action: Mock<Action>;

  beforeEach(() => {
    action = vi.fn<Action>(async () => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('defaults the config path to config.toml', async () => {
    await createProgram(action).exitOverride().parseAsync(argv());

    expect(action).toHaveBeenCalledWith({ config: 'config.toml' }, []);
  });

  it('parses the overrides', async () => {
    await createProgram(action)
      .exitOverride()
      .parseAsync(argv('-c', '/etc/duty/config.toml', '--host', '127.0.0.1', '-p', '9000', '--log-level', 'debug', '--check'));

    expect(action).toHaveBeenCalledWith(
      { config: '/etc/duty/config.toml', host: '127.0.0.1', port: 9000, logLevel: 'debug', check: true },
      [],
    );
  });

  it('hands extra arguments and unknown options to the action', async () => {
    await createProgram(action).exitOverride().parseAsync(argv('extra', '--bogus'));

    expect(action).toHaveBeenCalledWith({ config: 'config.toml' }, ['extra', '--bogus']);
  });

  it('rejects an invalid port', async () => {
    const err = await createProgram(action)
      .exitOverride()
      .parseAsync(argv('--port', '70000'))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CommanderError);
    expect(err).toMatchObject({ code: 'commander.invalidArgument' });
    expect(action).not.toHaveBeenCalled();
  });

  it('rejects an unknown log level', async () => {
    const err = await createProgram(action)
      .exitOverride()
      .parseAsync(argv('--log-level', 'verbose'))
      .catch((e: unknown) => e);

    expect(err).toMatchObject({ code: 'commander.invalidArgument' });
  });
});
