import { describe, it, expect } from 'vitest';
import path from 'path';
import { defaultConfig } from '../../../src/types/config.js';
import {
  applyFileDirectives,
  mergeLayers,
  resolveCascaded,
  resolveTypeConfig,
} from '../../../src/lib/config/resolver.js';
import { MemoryConfigSource, cascadeDirectories, loadCascaded } from '../../../src/lib/config/loader.js';
import { cleanDirectory, inferPathMode } from '../../../src/lib/config/path-mode.js';
import { findType, parseModule } from '../../helpers/modules.js';

const ROOT = path.resolve('/project');

describe('Config cascade', () => {
  it('should list directories between the root and the file, closest first', () => {
    expect(cascadeDirectories(ROOT, path.join(ROOT, 'src/app/user.gleam'))).toEqual([
      path.join(ROOT, 'src/app'),
      path.join(ROOT, 'src'),
    ]);
  });

  it('should let the closest document win', () => {
    const source = new MemoryConfigSource({
      [ROOT]: { fieldNaming: 'camel_case', absentFieldMode: 'maybe_absent' },
      [path.join(ROOT, 'src')]: { fieldNaming: 'snake_case' },
      [path.join(ROOT, 'src/app')]: { output: { separateFiles: false } },
    });

    const config = loadCascaded(ROOT, path.join(ROOT, 'src/app/user.gleam'), source);
    expect(config.fieldNaming).toBe('snake_case');
    expect(config.absentFieldMode).toBe('maybe_absent');
    expect(config.output.separateFiles).toBe(false);
    expect(config.output.generatedFileNaming).toBe('{module}_codecs.gleam');
  });

  it('should keep lower values for fields a layer leaves unset', () => {
    const merged = mergeLayers(defaultConfig(), [
      { output: { directory: 'gen' } },
      { output: { directory: undefined, separateEncoderDecoder: true } },
    ]);
    expect(merged.output.directory).toBe('gen');
    expect(merged.output.separateEncoderDecoder).toBe(true);
  });
});

describe('Path mode', () => {
  it('should infer the anchor from the directory marker', () => {
    expect(inferPathMode('@/gen', 'file-relative')).toBe('project-relative');
    expect(inferPathMode('/gen', 'file-relative')).toBe('project-relative');
    expect(inferPathMode('./gen', 'project-relative')).toBe('file-relative');
    expect(inferPathMode('gen', 'project-relative')).toBe('project-relative');
  });

  it('should strip anchor markers', () => {
    expect(cleanDirectory('@/gen')).toBe('gen');
    expect(cleanDirectory('@gen')).toBe('gen');
    expect(cleanDirectory('./gen/out')).toBe('gen/out');
    expect(cleanDirectory('gen')).toBe('gen');
  });

  it('should treat a config directory as project-relative', () => {
    const config = mergeLayers(defaultConfig(), [{ output: { directory: 'generated' } }]);
    expect(resolveCascaded(config).pathMode).toBe('project-relative');
    expect(resolveCascaded(defaultConfig()).pathMode).toBe('file-relative');
  });

  it('should treat a directive directory as file-relative unless marked', () => {
    expect(applyFileDirectives(defaultConfig(), { output: { directory: 'gen' } }).pathMode).toBe('file-relative');
    expect(applyFileDirectives(defaultConfig(), { output: { directory: '@gen' } }).pathMode).toBe(
      'project-relative',
    );
  });
});

describe('Type config resolution', () => {
  const module = parseModule(`
// weave-file!: output_dir = "gen", unknown_variant_message = "file {type}"
// weave!: decoder, camelCase, separate_encoder_decoder = true, decoder_fn = "parse_{type}"
pub type Account {
  Account(id: Int)
}

// weave!: decoder
pub type Plain {
  Plain(id: Int)
}
`);

  it('should apply type directives over file directives', () => {
    const fileConfig = applyFileDirectives(defaultConfig(), module.fileDirectives);
    const account = resolveTypeConfig(fileConfig, findType(module, 'Account')).config;

    expect(account.fieldNaming).toBe('camel_case');
    expect(account.output.directory).toBe('gen');
    expect(account.output.separateEncoderDecoder).toBe(true);
    expect(account.fnNaming.decoderFnPattern).toBe('parse_{type}');
    expect(account.unknownVariantMessage).toBe('file {type}');
  });

  it('should leave types without directives at the file config', () => {
    const fileConfig = applyFileDirectives(defaultConfig(), module.fileDirectives);
    const plain = resolveTypeConfig(fileConfig, findType(module, 'Plain'));

    expect(plain.config.fieldNaming).toBe('snake_case');
    expect(plain.config.output.separateEncoderDecoder).toBe(false);
    expect(plain.pathMode).toBe('file-relative');
  });
});
