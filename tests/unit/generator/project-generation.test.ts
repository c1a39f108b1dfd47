import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryConfigSource } from '../../../src/lib/config/loader.js';
import type { ConfigSource } from '../../../src/lib/config/loader.js';
import { generateForProject } from '../../../src/lib/generator/index.js';
import type { ProjectGenerationResult } from '../../../src/lib/generator/index.js';
import type { ParsedModule } from '../../../src/types/data-model.js';
import { ErrorCode } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';
import { parseModule } from '../../helpers/modules.js';

const MANIFEST = { dependencies: { gleam_json: '~> 1.0' }, devDependencies: {} };

const ORDER = parseModule(
  `
import billing/invoice.{type Invoice}

// weave!: decoder, encoder(json)
pub type Order {
  Order(invoice: Invoice)
}
`,
  'shop/order',
);

const RENAMED_INVOICE = parseModule(
  `
// weave!: decoder, encoder(json), decoder_fn = "parse_{type_snake}", encoder_fn = "write_{type_snake}"
pub type Invoice {
  Invoice(total: Int)
}
`,
  'billing/invoice',
);

const PLAIN_INVOICE = parseModule(
  `
// weave!: decoder, encoder(json)
pub type Invoice {
  Invoice(total: Int)
}
`,
  'billing/invoice',
);

function generate(modules: ParsedModule[], configSource: ConfigSource = new MemoryConfigSource()) {
  return generateForProject({ root: '/project', modules, manifest: MANIFEST }, { configSource });
}

function codeOf(result: ProjectGenerationResult, modulePath: string) {
  const units = result.outputs.get(`/project/src/${modulePath}.gleam`) ?? [];
  return units.flatMap((unit) => unit.types);
}

describe('Project generation', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('cross-module names', () => {
    it.each([
      ['referencing module first', [ORDER, RENAMED_INVOICE]],
      ['referenced module first', [RENAMED_INVOICE, ORDER]],
    ])('should call the directive-named functions with the %s', (_label, modules) => {
      const result = generate(modules);

      expect(result.failures).toEqual([]);
      const [order] = codeOf(result, 'shop/order');
      expect(order?.decoder?.split('\n')[1]).toBe(
        '  use invoice <- decode.field("invoice", billing_invoice.parse_invoice())',
      );
      expect(order?.encoder).toContain('#("invoice", billing_invoice.write_invoice(invoice)),');

      const [invoice] = codeOf(result, 'billing/invoice');
      expect(invoice?.decoder?.split('\n')[0]).toBe('pub fn parse_invoice() -> decode.Decoder(Invoice) {');
      expect(invoice?.encoder?.split('\n')[0]).toBe('pub fn write_invoice(invoice: Invoice) -> json.Json {');
    });

    it.each([
      ['referencing module first', [ORDER, PLAIN_INVOICE]],
      ['referenced module first', [PLAIN_INVOICE, ORDER]],
    ])('should call names from the directory config with the %s', (_label, modules) => {
      const configSource = new MemoryConfigSource({
        '/project/src/billing': { fnNaming: { decoderFnPattern: 'decode_{type_snake}' } },
      });
      const result = generate(modules, configSource);

      expect(result.failures).toEqual([]);
      const [order] = codeOf(result, 'shop/order');
      expect(order?.decoder?.split('\n')).toEqual([
        'pub fn order_decoder() -> decode.Decoder(Order) {',
        '  use invoice <- decode.field("invoice", billing_invoice.decode_invoice())',
        '  decode.success(Order(invoice:))',
        '}',
      ]);
      expect(result.registry.requireDecoder({ module: 'billing/invoice', name: 'Invoice' }, 'shop/order').name).toBe(
        'decode_invoice',
      );
    });
  });

  describe('failure isolation', () => {
    it('should fail only the file that declares a type twice', () => {
      const duplicated = parseModule(
        `
// weave!: decoder
pub type Dup {
  Dup(id: Int)
}

// weave!: decoder
pub type Dup {
  Dup(name: String)
}
`,
        'app/dup',
      );

      const result = generate([duplicated, PLAIN_INVOICE]);

      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]?.modulePath).toBe('app/dup');
      expect(result.failures[0]?.error.message).toBe('Type `Dup` is declared twice in module app/dup');
      expect(codeOf(result, 'app/dup')).toEqual([]);
      expect(codeOf(result, 'billing/invoice').map((type) => type.typeName)).toEqual(['Invoice']);
    });

    it('should wrap unexpected errors and keep generating other files', () => {
      const configSource: ConfigSource = {
        loadLayer(directory) {
          if (directory === '/project/src/shop') throw new Error('disk unavailable');
          return undefined;
        },
      };

      const result = generate([ORDER, PLAIN_INVOICE], configSource);

      expect(result.failures).toHaveLength(1);
      const failure = result.failures[0];
      expect(failure?.modulePath).toBe('shop/order');
      expect(failure?.error.code).toBe(ErrorCode.GENERATION_ERROR);
      expect(failure?.error.message).toBe(
        'Unexpected error while generating /project/src/shop/order.gleam: disk unavailable',
      );
      expect(failure?.error.details).toEqual({ filePath: '/project/src/shop/order.gleam', module: 'shop/order' });
      expect(codeOf(result, 'billing/invoice').map((type) => type.typeName)).toEqual(['Invoice']);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });
});
