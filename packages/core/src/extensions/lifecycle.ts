/**
 * Experiment lifecycle extensions
 *
 * An extension is a class (never an instance) that carries the static
 * `isLifecycleExtension` marker. Experiments instantiate the classes and call
 * the hooks at the matching points of their lifecycle.
 */

export type LifecycleHook = (context: Readonly<Record<string, unknown>>) => void;

export interface LifecycleHooks {
  onExperimentStart?: LifecycleHook;
  onExperimentEnd?: LifecycleHook;
  onRepetitionStart?: LifecycleHook;
  onRepetitionEnd?: LifecycleHook;
  onFoldStart?: LifecycleHook;
  onFoldEnd?: LifecycleHook;
  onRunStart?: LifecycleHook;
  onRunEnd?: LifecycleHook;
}

export interface LifecycleExtension {
  readonly hooks: Readonly<LifecycleHooks>;
}

export interface LifecycleExtensionClass {
  readonly isLifecycleExtension: true;
  readonly name: string;
  new (): LifecycleExtension;
}

/**
 * Build an extension class from plain hook functions
 *
 * @example
 * ```typescript
 * const PrintFolds = lambdaCallback({ onFoldEnd: (ctx) => console.log(ctx.fold) }, 'PrintFolds');
 * new Environment({ trainDataset, metricsMap: ['accuracy'], experimentCallbacks: PrintFolds });
 * ```
 */
export function lambdaCallback(
  hooks: LifecycleHooks,
  name: string = 'LambdaCallback'
): LifecycleExtensionClass {
  const frozenHooks: Readonly<LifecycleHooks> = Object.freeze({ ...hooks });

  const Extension = class implements LifecycleExtension {
    static readonly isLifecycleExtension = true as const;
    readonly hooks = frozenHooks;
  };
  Object.defineProperty(Extension, 'name', { value: name });

  return Extension;
}

export function isLifecycleExtensionClass(value: unknown): value is LifecycleExtensionClass {
  return typeof value === 'function' && Reflect.get(value, 'isLifecycleExtension') === true;
}
