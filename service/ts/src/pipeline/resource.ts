import { UnknownResourceError } from './errors.js';
import type {
  DataRecord,
  Resource,
  ResourceContext,
  ResourceOptions,
  Source,
  WriteDisposition,
} from './types.js';

type ResourceGenerator<T extends DataRecord> = (context: ResourceContext) => AsyncIterable<T>;

class GeneratorResource<T extends DataRecord> implements Resource<T> {
  readonly tableName: string;
  readonly writeDisposition: WriteDisposition;
  readonly primaryKey: readonly string[];

  constructor(
    readonly name: string,
    private readonly generator: ResourceGenerator<T>,
    options: ResourceOptions,
    private readonly limit: number | null = null
  ) {
    this.tableName = options.tableName ?? name;
    this.writeDisposition = options.writeDisposition ?? 'append';
    this.primaryKey = options.primaryKey ?? [];

    if (this.writeDisposition === 'merge' && this.primaryKey.length === 0) {
      throw new Error(`Resource ${name} uses merge but declares no primary key`);
    }
  }

  async *iterate(context: ResourceContext = { state: {} }): AsyncGenerator<T> {
    if (this.limit !== null && this.limit <= 0) return;
    let yielded = 0;
    // a fresh generator per iteration keeps the resource restartable
    for await (const item of this.generator(context)) {
      yield item;
      yielded += 1;
      if (this.limit !== null && yielded >= this.limit) return;
    }
  }

  addLimit(limit: number): Resource<T> {
    const bounded = this.limit === null ? limit : Math.min(this.limit, limit);
    return new GeneratorResource(
      this.name,
      this.generator,
      {
        tableName: this.tableName,
        writeDisposition: this.writeDisposition,
        primaryKey: [...this.primaryKey],
      },
      bounded
    );
  }
}

export const defineResource = <T extends DataRecord>(
  name: string,
  generator: ResourceGenerator<T>,
  options: ResourceOptions = {}
): Resource<T> => new GeneratorResource(name, generator, options);

class NamedSource implements Source {
  constructor(
    readonly name: string,
    readonly resources: ReadonlyMap<string, Resource>,
    private readonly selection: readonly string[]
  ) {}

  selected(): Resource[] {
    const picked: Resource[] = [];
    for (const name of this.selection) {
      const resource = this.resources.get(name);
      if (resource) picked.push(resource);
    }
    return picked;
  }

  withResources(...names: string[]): Source {
    this.assertKnown(names);
    return new NamedSource(this.name, this.resources, [...new Set(names)]);
  }

  withResource(name: string, replacement: Resource): Source {
    this.assertKnown([name]);
    const resources = new Map(this.resources);
    resources.set(name, replacement);
    return new NamedSource(this.name, resources, this.selection);
  }

  private assertKnown(names: string[]) {
    const missing = names.filter((name) => !this.resources.has(name));
    if (!missing.length) return;
    const available = [...this.resources.keys()];
    throw new UnknownResourceError(
      `Unknown resource(s) for source ${this.name}: ${missing.join(', ')}. Available: ${available.join(', ')}`,
      { source: this.name, missing, available }
    );
  }
}

/** A named group of resources; every resource is selected until `withResources` narrows it. */
export const defineSource = (name: string, resources: Resource[]): Source => {
  const byName = new Map<string, Resource>();
  for (const resource of resources) {
    if (byName.has(resource.name)) {
      throw new Error(`Duplicate resource ${resource.name} in source ${name}`);
    }
    byName.set(resource.name, resource);
  }
  return new NamedSource(name, byName, [...byName.keys()]);
};
