import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram, main } from './index';
import { createTestCliContext, type TestCliContext } from './testing/fakes';

describe('CLI Entry Point', () => {
  let tmpDir: string;
  let ctx: TestCliContext;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloudctx-cli-test-'));
    ctx = createTestCliContext(path.join(tmpDir, 'contexts.json'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should show help when no command provided', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await main(['node', 'cloudctx']);

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('cloudctx v0.1.0'));
    expect(consoleLogSpy).toHaveBeenCalledWith('Usage: cloudctx <command> [options]');
    expect(consoleLogSpy).toHaveBeenCalledWith('  login                   - Log in and save credentials as a context');
  });

  it('should register every command', () => {
    const program = createProgram(ctx);
    const names = program.commands.map((cmd) => cmd.name());

    expect(names).toEqual(['login', 'current-context', 'list-context', 'update-current-context']);
  });

  it('should route list-context to the store', async () => {
    ctx.store.addContext({ name: 'dev', endpoint: 'https://x.io', apiToken: 'tok1', email: 'a@b.com' });

    await createProgram(ctx).parseAsync(['node', 'cloudctx', 'list-context']);

    expect(ctx.reporter.messages('json')).toEqual(['["dev"]']);
  });

  it('should route update-current-context with its argument', async () => {
    ctx.store.addContext({ name: 'dev', endpoint: 'https://x.io', apiToken: 'tok1', email: 'a@b.com' });
    ctx.store.addContext({ name: 'prod', endpoint: 'https://x.io', apiToken: 'tok2', email: 'a@b.com' });

    await createProgram(ctx).parseAsync(['node', 'cloudctx', 'update-current-context', 'dev']);

    expect(ctx.store.getCurrentContextName()).toBe('dev');
  });

  it('should reject update-current-context without a name', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const program = createProgram(ctx).exitOverride();
    for (const cmd of program.commands) cmd.exitOverride();

    await expect(
      program.parseAsync(['node', 'cloudctx', 'update-current-context'])
    ).rejects.toMatchObject({ code: 'commander.missingArgument' });
  });
});
