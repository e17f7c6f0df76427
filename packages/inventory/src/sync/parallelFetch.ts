import pLimit from "p-limit";

import type { ParametersGateway } from "../api/parametersGateway";

export interface FetchAllOptions<K, V> {
  concurrency: number;
  onResult?: (key: K, value: V) => void;
}

/**
 * Runs `task` once per distinct key on a bounded pool and collects results in
 * completion order.
 *
 * The first rejection rejects the returned promise straight away and no
 * partial map is handed back. Nothing is cancelled: every submitted task
 * still runs to completion and its result is dropped.
 */
export function fetchAll<K, V>(
  keys: Iterable<K>,
  task: (key: K) => Promise<V>,
  options: FetchAllOptions<K, V>
): Promise<Map<K, V>> {
  const distinctKeys = [...new Set(keys)];
  const results = new Map<K, V>();

  if (distinctKeys.length === 0) {
    return Promise.resolve(results);
  }

  const limit = pLimit(Math.max(1, options.concurrency));

  return new Promise<Map<K, V>>((resolve, reject) => {
    let failed = false;
    let remaining = distinctKeys.length;

    const fail = (error: unknown): void => {
      if (failed) {
        return;
      }

      failed = true;
      reject(error);
    };

    const settle = (key: K, value: V): void => {
      if (failed) {
        return;
      }

      results.set(key, value);

      try {
        options.onResult?.(key, value);
      } catch (error) {
        fail(error);
        return;
      }

      remaining -= 1;
      if (remaining === 0) {
        resolve(results);
      }
    };

    for (const key of distinctKeys) {
      limit(() => task(key)).then(
        (value) => settle(key, value),
        (error: unknown) => fail(error)
      );
    }
  });
}

export interface FetchParameterValuesOptions {
  concurrency: number;
  decrypt: boolean;
  onResult?: (name: string, value: string) => void;
}

export function fetchParameterValues(
  gateway: ParametersGateway,
  names: Iterable<string>,
  options: FetchParameterValuesOptions
): Promise<Map<string, string>> {
  return fetchAll(
    names,
    (name) => gateway.getParameterValue(name, { decrypt: options.decrypt }),
    { concurrency: options.concurrency, onResult: options.onResult }
  );
}
