import { UnknownModelError } from '../errors';

export type ModelAlias = 'small' | 'large' | 'private';

export type ModelEntry = {
  model: string;
  provider: string;
};

/**
 * Maps stable aliases used by flows to concrete provider models, so a flow
 * can move to another model through configuration alone
 */
export class ModelRegistry {
  private readonly entries = new Map<string, ModelEntry>();

  register(alias: string, entry: ModelEntry): this {
    this.entries.set(alias, { ...entry });
    return this;
  }

  has(alias: string): boolean {
    return this.entries.has(alias);
  }

  entry(alias: string): ModelEntry {
    const entry = this.entries.get(alias);
    if (!entry) {
      throw new UnknownModelError(alias, this.aliases);
    }
    return { ...entry };
  }

  /**
   * Provider model name for an alias
   * @throws UnknownModelError
   */
  resolve(alias: string): string {
    return this.entry(alias).model;
  }

  get aliases(): string[] {
    return Array.from(this.entries.keys());
  }
}

export function createModelRegistry(models: Record<ModelAlias, string>, provider = 'openai'): ModelRegistry {
  const registry = new ModelRegistry();
  for (const [alias, model] of Object.entries(models)) {
    registry.register(alias, { model, provider });
  }
  return registry;
}
