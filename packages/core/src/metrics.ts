/**
 * Metric registry shapes
 *
 * Resolving names to scoring functions happens outside the environment; here
 * the registry is only carried, checked for exclusivity and fingerprinted.
 */

export type MetricFunction = (target: readonly number[], prediction: readonly number[]) => number;

/**
 * A metric is either computed by a function or looked up by name later
 */
export type MetricSpec = MetricFunction | string;

/**
 * Either a list of metric names, or ids mapped to a spec (`null` = look up the id itself)
 */
export type MetricsMap = readonly string[] | Readonly<Record<string, MetricSpec | null>>;

export type MetricsParams = Readonly<Record<string, unknown>>;

/**
 * Key under which the metrics registry is folded into `metricsParams`
 */
export const METRICS_MAP_KEY = 'metricsMap';
