import * as fs from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import { vi } from 'vitest';
import type { CommandRunner } from '../command-runner';
import type { PipelineLogger } from '../logger';

export interface RecordedCommand {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * Models `npm install --prefix <dir> --no-save <specs>`: each install
 * replaces the packages of earlier installs unless `<dir>/package.json`
 * lists them in `dependencies`, then writes a minimal package directory per
 * spec. Installing `sharp` also brings its platform binary packages.
 */
export class FakeNpmRunner implements CommandRunner {
  readonly commands: RecordedCommand[] = [];

  constructor(private readonly failOn?: (args: string[]) => boolean) {}

  run(command: string, args: string[], cwd: string): void {
    this.commands.push({ command, args, cwd });
    if (this.failOn?.(args)) {
      throw new Error(`Command failed: ${command} ${args.join(' ')}`);
    }

    const prefix = args[args.indexOf('--prefix') + 1];
    removeExtraneous(prefix);
    const specs = args.slice(args.indexOf('--prefix') + 2).filter(arg => !arg.startsWith('--'));
    for (const spec of specs) {
      if (spec.endsWith('.tgz')) {
        writePackage(prefix, 'jwstascii-helpers');
        continue;
      }
      const name = spec.slice(0, spec.lastIndexOf('@') > 0 ? spec.lastIndexOf('@') : spec.length);
      writePackage(prefix, name);
      if (name === 'sharp') {
        writePackage(prefix, '@img/sharp-linux-x64');
        writePackage(prefix, '@img/sharp-libvips-linux-x64');
      }
    }
  }
}

function declaredDependencies(prefix: string): string[] {
  const manifestPath = path.join(prefix, 'package.json');
  if (!fs.existsSync(manifestPath)) {
    return [];
  }
  const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
  if (typeof manifest !== 'object' || manifest === null || !('dependencies' in manifest)) {
    return [];
  }
  const { dependencies } = manifest;
  return typeof dependencies === 'object' && dependencies !== null ? Object.keys(dependencies) : [];
}

function removeExtraneous(prefix: string): void {
  const nodeModules = path.join(prefix, 'node_modules');
  if (!fs.existsSync(nodeModules)) {
    return;
  }
  const kept = new Set(declaredDependencies(prefix));
  for (const entry of fs.readdirSync(nodeModules)) {
    const names = entry.startsWith('@')
      ? fs.readdirSync(path.join(nodeModules, entry)).map(child => `${entry}/${child}`)
      : [entry];
    for (const name of names) {
      if (!kept.has(name)) {
        fs.rmSync(path.join(nodeModules, ...name.split('/')), { recursive: true, force: true });
      }
    }
  }
}

function writePackage(prefix: string, name: string): void {
  const dir = path.join(prefix, 'node_modules', ...name.split('/'));
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'package.json'), JSON.stringify({ name, version: '1.0.0' }));
  fs.writeFileSync(path.join(dir, 'index.js'), 'module.exports = {};\n');
}

export function createLoggerStub(): PipelineLogger {
  return {
    step: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

/**
 * Minimal project tree: an entry point importing the helpers package, and
 * the helpers package declaring `dependencies`.
 */
export function writeProjectFixture(root: string, dependencies: Record<string, string>): void {
  const helpersDir = path.join(root, 'layer', 'jwstascii-helpers');
  fs.mkdirSync(path.join(helpersDir, 'src'), { recursive: true });
  fs.writeFileSync(
    path.join(helpersDir, 'package.json'),
    JSON.stringify({ name: 'jwstascii-helpers', version: '1.2.3', main: 'src/index.ts', dependencies }, null, 2)
  );
  fs.writeFileSync(
    path.join(helpersDir, 'src', 'index.ts'),
    "export function greet(name: string): string {\n  return `hello ${name}`;\n}\n"
  );

  fs.mkdirSync(path.join(root, 'functions'), { recursive: true });
  fs.writeFileSync(
    path.join(root, 'functions', 'index.ts'),
    "import { greet } from 'jwstascii-helpers';\n\nexport async function handler(): Promise<string> {\n  return greet('lambda');\n}\n"
  );
}

/** File entries of a zip archive, sorted, directories left out. */
export async function listArchiveFiles(archivePath: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(fs.readFileSync(archivePath));
  return Object.values(zip.files)
    .filter(entry => !entry.dir)
    .map(entry => entry.name)
    .sort();
}
