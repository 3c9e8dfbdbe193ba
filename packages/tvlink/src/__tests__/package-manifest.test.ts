/**
 * Tests for the workspace package manifests and the built CLI
 */

import { describe, it, expect } from 'vitest';
import { execFile } from 'child_process';
import { existsSync, readFileSync, readdirSync } from 'fs';
import { builtinModules } from 'module';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { promisify } from 'util';
import { z } from 'zod';

const run = promisify(execFile);

const root = fileURLToPath(new URL('../../../../', import.meta.url));
const WORKSPACES = ['models', 'schemas', 'core', 'tvlink'];

const ManifestSchema = z.object({
  name: z.string(),
  bin: z.record(z.string()).optional(),
  exports: z.object({
    '.': z.object({ source: z.string(), types: z.string(), default: z.string() }),
  }),
  scripts: z.object({ build: z.string() }),
  dependencies: z.record(z.string()).optional(),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({
    rootDir: z.string(),
    outDir: z.string(),
    customConditions: z.array(z.string()),
  }),
});

const readJson = (path: string): unknown => JSON.parse(readFileSync(join(root, path), 'utf8'));

const manifest = (name: string) => ManifestSchema.parse(readJson(`packages/${name}/package.json`));

const IMPORT_PATTERN = /(?:from|import)\s*\(?\s*'([^'.][^']*)'/g;

const packageOf = (specifier: string) => {
  const segments = specifier.replace(/^node:/, '').split('/');
  return specifier.startsWith('@') ? segments.slice(0, 2).join('/') : segments[0];
};

/** Bare packages imported by the runtime sources of a workspace */
const runtimeImports = (name: string): Set<string> => {
  const dir = join(root, 'packages', name, 'src');
  const files = readdirSync(dir, { recursive: true, encoding: 'utf8' }).filter(
    (file) => file.endsWith('.ts') && !file.endsWith('.test.ts') && !file.includes('__tests__'),
  );
  const found = new Set<string>();
  for (const file of files) {
    for (const match of readFileSync(join(dir, file), 'utf8').matchAll(IMPORT_PATTERN)) {
      found.add(packageOf(match[1]));
    }
  }
  return found;
};

describe('workspace manifests', () => {
  it.each(WORKSPACES)('%s resolves to built output outside the type-check', (name) => {
    const entry = manifest(name).exports['.'];

    expect(entry).toEqual({
      source: './src/index.ts',
      types: './dist/index.d.ts',
      default: './dist/index.js',
    });
  });

  it.each(WORKSPACES)('%s builds src into dist without the source condition', (name) => {
    expect(manifest(name).scripts.build).toBe('tsc -p tsconfig.build.json');

    const config = BuildConfigSchema.parse(readJson(`packages/${name}/tsconfig.build.json`));
    expect(config.compilerOptions).toEqual({ rootDir: 'src', outDir: 'dist', customConditions: [] });
  });

  it.each(WORKSPACES)('%s declares every package its sources import', (name) => {
    const { name: own, dependencies = {} } = manifest(name);
    const builtins = new Set(builtinModules);

    const undeclared = [...runtimeImports(name)].filter(
      (pkg) => pkg !== own && !builtins.has(pkg) && !(pkg in dependencies),
    );

    expect(undeclared).toEqual([]);
  });

  it('points both bins at the compiled entry point', () => {
    const rootBin = z.object({ bin: z.record(z.string()) }).parse(readJson('package.json')).bin;

    expect(manifest('tvlink').bin).toEqual({ tvlink: './dist/cli.js' });
    expect(rootBin).toEqual({ tvlink: './packages/tvlink/dist/cli.js' });
    expect(readFileSync(join(root, 'packages/tvlink/src/cli.ts'), 'utf8')).toMatch(
      /^#!\/usr\/bin\/env node\n/,
    );
  });
});

// Runs only after `npm run build`
describe.runIf(existsSync(join(root, 'packages/tvlink/dist/cli.js')))('built output', () => {
  const env = { ...process.env, TVLINK_LOG: '' };

  it('loads @tvlink/core under plain Node', async () => {
    const { stdout } = await run(
      process.execPath,
      [
        '--input-type=module',
        '-e',
        "const core = await import('@tvlink/core'); console.log(typeof core.withRetry, core.loadRegisterPayload().pairingType);",
      ],
      { cwd: join(root, 'packages/tvlink'), env },
    );

    expect(stdout).toBe('function PROMPT\n');
  });

  it('starts the tvlink command', async () => {
    const { stdout } = await run(
      process.execPath,
      [join(root, 'packages/tvlink/dist/cli.js'), '--help'],
      { cwd: root, env },
    );

    expect(stdout.startsWith('Usage: tvlink')).toBe(true);
  });
});
