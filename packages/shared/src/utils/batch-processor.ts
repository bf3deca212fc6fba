import { chunk } from 'es-toolkit';

/**
 * BatchProcessor - Batch processing utility
 *
 * Splits arrays into fixed-size batches and maps them batch by batch.
 */
export class BatchProcessor {
  /**
   * Splits an array into batches of specified size.
   * A batch size of 0 keeps every item in a single batch.
   *
   * @example
   * ```typescript
   * BatchProcessor.createBatches([1, 2, 3, 4, 5], 2);
   * // [[1, 2], [3, 4], [5]]
   * ```
   */
  static createBatches<T>(items: readonly T[], batchSize: number): T[][] {
    if (items.length === 0) {
      return [];
    }
    if (batchSize <= 0) {
      return [[...items]];
    }
    return chunk(items, batchSize);
  }

  /**
   * Splits an array into batches, maps each batch and flattens the results
   * back into input order.
   *
   * @example
   * ```typescript
   * const pages = BatchProcessor.processBatchSync(
   *   ['a', 'b', 'c'],
   *   2,
   *   (batch) => batch.map((text) => text.toUpperCase()),
   * );
   * // ['A', 'B', 'C']
   * ```
   */
  static processBatchSync<T, R>(
    items: readonly T[],
    batchSize: number,
    processFn: (batch: T[]) => R[],
  ): R[] {
    const batches = this.createBatches(items, batchSize);
    return batches.flatMap((batch) => processFn(batch));
  }
}
