import type { Logger } from '@logtape/logtape';
import { getCellwireLogger } from '../utils/logger';
import type { AnyValueType, ValueType } from '../value-type';
import type { ValueConverter, ValueConverterType } from './value-converter';

export interface ConverterRegistration {
  register<Source, Destination>(
    source: ValueType<Source>,
    destination: ValueType<Destination>,
    converter: ValueConverterType<Source, Destination>
  ): void;
}

/** Startup hook that registers a group of converters. */
export type ConverterProvider = (registry: ConverterRegistration) => void;

export type ConverterRegistryOptions = {
  readonly providers?: readonly ConverterProvider[];
  readonly logger?: Logger;
};

type ConverterEntry = {
  readonly source: string;
  readonly destination: string;
  readonly type: ValueConverterType<unknown, unknown>;
};

function pairKey(source: AnyValueType, destination: AnyValueType): string {
  return `${source.name}->${destination.name}`;
}

function isConverterFor<Source, Destination>(
  entry: ConverterEntry,
  source: ValueType<Source>,
  destination: ValueType<Destination>
): entry is ConverterEntry & { type: ValueConverterType<Source, Destination> } {
  return entry.source === source.name && entry.destination === destination.name;
}

/**
 * Exact `(source, destination)` lookup of converter classes. Providers run
 * once, on the first lookup or an explicit `initialize()`.
 */
export class ConverterRegistry implements ConverterRegistration {
  readonly #converters = new Map<string, ConverterEntry>();
  readonly #providers: readonly ConverterProvider[];
  readonly #logger: Logger;
  #initialized = false;

  constructor(options: ConverterRegistryOptions = {}) {
    this.#providers = options.providers ?? [];
    this.#logger = getCellwireLogger('converters', options.logger);
  }

  get isInitialized(): boolean {
    return this.#initialized;
  }

  get converterCount(): number {
    return this.#converters.size;
  }

  initialize(): this {
    if (this.#initialized) {
      return this;
    }

    this.#initialized = true;
    for (const provider of this.#providers) {
      provider(this);
    }

    this.#logger.info('Converter registry initialized with {count} converters', {
      count: this.#converters.size
    });

    return this;
  }

  register<Source, Destination>(
    source: ValueType<Source>,
    destination: ValueType<Destination>,
    converter: ValueConverterType<Source, Destination>
  ): void {
    const key = pairKey(source, destination);
    if (this.#converters.has(key)) {
      this.#logger.debug('Replacing converter for {pair}', { pair: key });
    }

    this.#converters.set(key, {
      source: source.name,
      destination: destination.name,
      type: converter
    });
  }

  /** No inheritance or coercion: only the exact pair matches. */
  findConverterType<Source, Destination>(
    source: ValueType<Source>,
    destination: ValueType<Destination>
  ): ValueConverterType<Source, Destination> | undefined {
    this.initialize();

    const entry = this.#converters.get(pairKey(source, destination));
    if (entry === undefined || !isConverterFor(entry, source, destination)) {
      return undefined;
    }

    return entry.type;
  }

  createConverter<Source, Destination>(
    source: ValueType<Source>,
    destination: ValueType<Destination>
  ): ValueConverter<Source, Destination> | undefined {
    const ConverterType = this.findConverterType(source, destination);

    return ConverterType === undefined ? undefined : new ConverterType();
  }
}
