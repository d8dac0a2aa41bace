export interface BatchLimits {
  /** Maximum chunks per batch */
  batchSize: number;
  /** Maximum characters per batch; a single larger chunk still forms a batch */
  maxBatchChars: number;
}

/**
 * Pack lines into newline-joined chunks of at most maxLength characters,
 * splitting only on line boundaries. A line longer than maxLength becomes
 * a chunk of its own.
 */
export function chunkLines(lines: readonly string[], maxLength: number): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let length = 0;

  const flush = () => {
    if (current.length > 0) chunks.push(current.join("\n"));
    current = [];
    length = 0;
  };

  for (const line of lines) {
    if (current.length > 0 && length + 1 + line.length > maxLength) flush();
    length = current.length === 0 ? line.length : length + 1 + line.length;
    current.push(line);
  }
  flush();
  return chunks;
}

/**
 * Accumulates chunks and hands back a full batch whenever the next chunk
 * would break a limit.
 */
export class BatchBuilder {
  private batch: string[] = [];
  private chars = 0;

  constructor(private readonly limits: BatchLimits) {}

  /** Add a chunk; returns the batch completed by it, if any */
  push(chunk: string): string[] | null {
    let completed: string[] | null = null;
    if (
      this.batch.length > 0 &&
      (this.batch.length >= this.limits.batchSize || this.chars + chunk.length > this.limits.maxBatchChars)
    ) {
      completed = this.flush();
    }
    this.batch.push(chunk);
    this.chars += chunk.length;
    return completed;
  }

  /** Take the pending batch, or null when empty */
  flush(): string[] | null {
    if (this.batch.length === 0) return null;
    const completed = this.batch;
    this.batch = [];
    this.chars = 0;
    return completed;
  }
}

export function packBatches(chunks: Iterable<string>, limits: BatchLimits): string[][] {
  const builder = new BatchBuilder(limits);
  const batches: string[][] = [];
  for (const chunk of chunks) {
    const completed = builder.push(chunk);
    if (completed) batches.push(completed);
  }
  const last = builder.flush();
  if (last) batches.push(last);
  return batches;
}
