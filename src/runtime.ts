import type { Logger } from '@logtape/logtape';
import { ComputedCell, type ComputedCellOptions } from './cells/computed-cell';
import { ReactiveCell, type ReactiveCellOptions } from './cells/reactive-cell';
import { ConverterRegistry, registerBuiltinConverters, type ConverterProvider } from './converters';
import { EventBus } from './events/event-bus';
import { PropertyStore } from './store';
import { ImmediateThreadMarshaller, QueuedThreadMarshaller } from './threading';
import type { CellContext, ThreadMarshaller } from './types';
import { getCellwireLogger } from './utils/logger';

export type RuntimeMode = 'immediate' | 'queued';

export type RuntimeOptions = {
  readonly name?: string;
  /**
   * `immediate` runs everything inline; `queued` defers event dispatch to
   * `tick()` or to a timer started with `start()`. Ignored when a
   * `marshaller` is given.
   */
  readonly mode?: RuntimeMode;
  readonly marshaller?: ThreadMarshaller;
  readonly maxActionsPerTick?: number;
  readonly dispatchOnMainThread?: boolean;
  /** Defaults to the built-in converters. */
  readonly converterProviders?: readonly ConverterProvider[];
  readonly logger?: Logger;
};

/**
 * One marshaller, event bus, property store and converter registry wired
 * together. Create one per application, or one per test.
 */
export class Runtime {
  readonly marshaller: ThreadMarshaller;
  readonly eventBus: EventBus;
  readonly properties: PropertyStore;
  readonly converters: ConverterRegistry;
  readonly cellContext: CellContext;
  readonly #logger: Logger;

  constructor(options: RuntimeOptions = {}) {
    this.#logger = getCellwireLogger('runtime', options.logger);
    this.marshaller =
      options.marshaller ??
      (options.mode === 'queued'
        ? new QueuedThreadMarshaller({
            maxActionsPerTick: options.maxActionsPerTick,
            logger: options.logger
          })
        : new ImmediateThreadMarshaller());

    this.eventBus = new EventBus({
      marshaller: this.marshaller,
      dispatchOnMainThread: options.dispatchOnMainThread,
      logger: options.logger
    }).initialize();

    this.properties = new PropertyStore({
      name: options.name,
      context: {
        marshaller: this.marshaller,
        events: this.eventBus,
        logger: options.logger
      },
      logger: options.logger
    });

    this.cellContext = {
      marshaller: this.marshaller,
      events: this.eventBus,
      keys: this.properties,
      logger: options.logger
    };

    this.converters = new ConverterRegistry({
      providers: options.converterProviders ?? [registerBuiltinConverters],
      logger: options.logger
    });

    this.#logger.debug('Runtime {name} created with {marshaller}', {
      name: options.name ?? 'default',
      marshaller: String(this.marshaller)
    });
  }

  reactive<V>(initialValue: V, options: ReactiveCellOptions<V> = {}): ReactiveCell<V> {
    return new ReactiveCell(initialValue, { ...options, context: this.cellContext });
  }

  computed<V>(compute: () => V, options: ComputedCellOptions<V> = {}): ComputedCell<V> {
    return new ComputedCell(compute, { ...options, context: this.cellContext });
  }

  /** Drains one tick of marshalled work. Returns how many actions ran. */
  tick(): number {
    if (this.marshaller instanceof QueuedThreadMarshaller) {
      return this.marshaller.processMainThreadActions();
    }

    return 0;
  }

  start(intervalMs?: number): void {
    if (this.marshaller instanceof QueuedThreadMarshaller) {
      this.marshaller.start(intervalMs);
    }
  }

  dispose(): void {
    if (this.marshaller instanceof QueuedThreadMarshaller) {
      this.marshaller.stop();
      this.marshaller.clearQueue();
    }

    this.eventBus.clear();
    this.properties.clear();
  }
}

export function createRuntime(options?: RuntimeOptions): Runtime {
  return new Runtime(options);
}
