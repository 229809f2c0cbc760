/**
 * 有界并发 map
 * 结果按输入顺序返回，与完成顺序无关。
 * 首个失败后不再启动新项，等待进行中的项结束后抛出首个错误。
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const laneCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: laneCount }, runLane));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
