import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  formatDiagnostic,
  loadManifest,
  loadProject,
  modulePathFor,
  parseManifest,
} from '../../../src/lib/project/index.js';
import { ConfigError, ParseError } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';

describe('Manifest parsing', () => {
  it('should read dependencies and dev-dependencies', () => {
    const manifest = parseManifest(
      'name = "app"\n\n[dependencies]\ngleam_json = "~> 1.0"\n\n[dev-dependencies]\ngleeunit = "~> 1.0"\n',
      '/project/gleam.toml',
    );

    expect(manifest.path).toBe('/project/gleam.toml');
    expect(manifest.dependencies['gleam_json']).toBe('~> 1.0');
    expect(Object.keys(manifest.devDependencies)).toEqual(['gleeunit']);
  });

  it('should treat missing tables as empty', () => {
    const manifest = parseManifest('name = "app"\n');
    expect(Object.keys(manifest.dependencies)).toEqual([]);
    expect(Object.keys(manifest.devDependencies)).toEqual([]);
  });

  it('should reject invalid TOML', () => {
    expect(() => parseManifest('[dependencies\n')).toThrow(ConfigError);
  });
});

describe('Module paths', () => {
  it('should derive slash separated paths relative to src', () => {
    const sourceDir = path.join('/project', 'src');
    expect(modulePathFor(sourceDir, path.join(sourceDir, 'app', 'models', 'user.gleam'))).toBe('app/models/user');
    expect(modulePathFor(sourceDir, path.join(sourceDir, 'app.gleam'))).toBe('app');
  });
});

describe('Diagnostic formatting', () => {
  it('should prefix the location when present', () => {
    const base = { level: 'type' as const, key: 'colour', raw: 'colour', reason: 'unknown-key' as const };
    expect(formatDiagnostic({ ...base, message: 'Unknown type directive `colour`', location: 'src/a.gleam:3' })).toBe(
      'src/a.gleam:3: Unknown type directive `colour`',
    );
    expect(formatDiagnostic({ ...base, message: 'Unknown type directive `colour`' })).toBe(
      'Unknown type directive `colour`',
    );
  });
});

describe('Project loading', () => {
  let root: string;

  function write(relative: string, content: string): void {
    const file = path.join(root, relative);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, content);
  }

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'typeweave-project-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should return no manifest when gleam.toml is absent', async () => {
    expect(await loadManifest(root)).toBeUndefined();
  });

  it('should scan modules in path order', async () => {
    write('src/zoo.gleam', 'pub type Zoo {\n  Zoo\n}\n');
    write('src/app/user.gleam', '// weave!: decoder\npub type User {\n  User(name: String)\n}\n');
    write('src/app/notes.txt', 'not a module');

    const project = await loadProject(root);

    expect(project.manifest).toBeUndefined();
    expect(project.modules.map((module) => module.modulePath)).toEqual(['app/user', 'zoo']);
    expect(project.modules[0]?.types[0]?.decoder).toBe(true);
    expect(project.diagnostics).toEqual([]);
  });

  it('should warn about directive diagnostics', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    write('src/app/user.gleam', '// weave!: decoder, colour\npub type User {\n  User(name: String)\n}\n');

    const project = await loadProject(root);

    expect(project.diagnostics).toHaveLength(1);
    expect(project.diagnostics[0]?.key).toBe('colour');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should turn diagnostics into a parse error in strict mode', async () => {
    write('src/app/user.gleam', '// weave!: decoder, colour\npub type User {\n  User(name: String)\n}\n');
    await expect(loadProject(root, { strict: true })).rejects.toThrow(ParseError);
  });
});
