import { describe, it, expect } from 'vitest';
import { encoderName, generateEncoder } from '../../../src/lib/generator/encoder.js';
import { JsonEncoderBackend, ModuleEncoderBackend } from '../../../src/lib/backend/json-backend.js';
import { contextFor, parseModule } from '../../helpers/modules.js';

const MODELS = parseModule(`
import gleam/option.{type Option}

// weave!: encoder(json)
pub type User {
  User(name: String, age: Int, email: Option(String))
}

// weave!: encoder(json), type_tag = "kind"
pub type Shape {
  Circle(radius: Float)
  Empty
}

// weave!: encoder(json), no_type_tag
pub type Untagged {
  Circle2(radius: Float)
  Empty2
}

// weave!: encoder(json)
pub type Color {
  Red
  DarkBlue
}

// weave!: encoder(json)
pub type Unit {
  Unit
}

// weave!: encoder(json)
pub type Point {
  Point(Int, Int)
}

// weave!: encoder(json), encoder(msgpack)
pub type Multi {
  Multi(flag: Bool)
}
`);

const json = new JsonEncoderBackend();

describe('Encoder generation', () => {
  it('should destructure a single constructor into an object', () => {
    expect(generateEncoder(contextFor([MODELS], 'User'), json, 'json')).toBe(
      [
        'pub fn user_to_json(user: User) -> json.Json {',
        '  let User(name:, age:, email:) = user',
        '  json.object([',
        '    #("name", json.string(name)),',
        '    #("age", json.int(age)),',
        '    #("email", json.nullable(email, fn(item) { json.string(item) })),',
        '  ])',
        '}',
      ].join('\n'),
    );
  });

  it('should put the type tag first in each variant', () => {
    expect(generateEncoder(contextFor([MODELS], 'Shape'), json, 'json')).toBe(
      [
        'pub fn shape_to_json(shape: Shape) -> json.Json {',
        '  case shape {',
        '    Circle(radius:) -> json.object([',
        '      #("kind", json.string("circle")),',
        '      #("radius", json.float(radius)),',
        '    ])',
        '    Empty -> json.object([',
        '      #("kind", json.string("empty")),',
        '    ])',
        '  }',
        '}',
      ].join('\n'),
    );
  });

  it('should omit the tag when disabled', () => {
    expect(generateEncoder(contextFor([MODELS], 'Untagged'), json, 'json')).toBe(
      [
        'pub fn untagged_to_json(untagged: Untagged) -> json.Json {',
        '  case untagged {',
        '    Circle2(radius:) -> json.object([',
        '      #("radius", json.float(radius)),',
        '    ])',
        '    Empty2 -> json.object([])',
        '  }',
        '}',
      ].join('\n'),
    );
  });

  it('should encode plain string enums as strings', () => {
    expect(generateEncoder(contextFor([MODELS], 'Color'), json, 'json')).toBe(
      [
        'pub fn color_to_json(color: Color) -> json.Json {',
        '  case color {',
        '    Red -> json.string("red")',
        '    DarkBlue -> json.string("dark_blue")',
        '  }',
        '}',
      ].join('\n'),
    );
    expect(generateEncoder(contextFor([MODELS], 'Unit'), json, 'json')).toBe(
      ['pub fn unit_to_json(unit: Unit) -> json.Json {', '  json.string("unit")', '}'].join('\n'),
    );
  });

  it('should bind unlabeled fields positionally', () => {
    expect(generateEncoder(contextFor([MODELS], 'Point'), json, 'json').split('\n').slice(0, 4)).toEqual([
      'pub fn point_to_json(point: Point) -> json.Json {',
      '  let Point(field_0, field_1) = point',
      '  json.object([',
      '    #("field_0", json.int(field_0)),',
    ]);
  });

  it('should use the given backend', () => {
    const msgpack = new ModuleEncoderBackend({
      id: 'msgpack',
      module: 'app/codec/msgpack',
      alias: 'mp',
      outputType: 'Value',
      packages: [],
    });
    expect(generateEncoder(contextFor([MODELS], 'Multi'), msgpack, 'msgpack')).toBe(
      [
        'pub fn multi_to_msgpack(multi: Multi) -> mp.Value {',
        '  let Multi(flag:) = multi',
        '  mp.object([',
        '    #("flag", mp.bool(flag)),',
        '  ])',
        '}',
      ].join('\n'),
    );
  });

  it('should suffix names of several backends without a backend placeholder', () => {
    const ctx = contextFor([MODELS], 'Multi', {
      fnNaming: { encoderFnPattern: 'encode_{type_snake}', decoderFnPattern: '{type_snake}_decoder' },
    });
    expect(encoderName(ctx, 'json')).toBe('encode_multi_json');
    expect(encoderName(ctx, 'msgpack')).toBe('encode_multi_msgpack');
    expect(() => encoderName(ctx, 'xml')).toThrow('Type `Multi` does not request an encoder for backend `xml`');
  });
});
