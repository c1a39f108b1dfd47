/**
 * Backend registry - backend tag to implementation
 */

import { GenerationError } from "../../utils/errors.js";
import { JsonEncoderBackend } from "./json-backend.js";
import type { EncoderBackend } from "./types.js";

export class BackendRegistry {
  private readonly backends: Map<string, EncoderBackend>;

  constructor(backends?: Iterable<readonly [string, EncoderBackend]>) {
    this.backends = new Map<string, EncoderBackend>();
    for (const [tag, backend] of backends ?? [["json", new JsonEncoderBackend()]]) {
      this.backends.set(tag.toLowerCase(), backend);
    }
  }

  /**
   * A copy of this registry with `backend` registered under `tag`
   */
  withBackend(tag: string, backend: EncoderBackend): BackendRegistry {
    return new BackendRegistry([...this.backends, [tag.toLowerCase(), backend]]);
  }

  get(tag: string): EncoderBackend | undefined {
    return this.backends.get(tag.toLowerCase());
  }

  has(tag: string): boolean {
    return this.backends.has(tag.toLowerCase());
  }

  require(tag: string): EncoderBackend {
    const backend = this.get(tag);
    if (!backend) {
      throw new GenerationError(
        `No encoder backend registered for \`${tag}\` (registered: ${this.tags().join(", ") || "none"})`,
        { backend: tag },
      );
    }
    return backend;
  }

  tags(): string[] {
    return [...this.backends.keys()].sort();
  }
}
