export type CrawlOptions = {
  /**
   * Number of sources crawled at the same time.
   * WorkItems of one source always run one after another.
   * @default 1
   */
  sourceConcurrency?: number;

  /**
   * Keep crawling the remaining sources after one source run fails.
   * When false, sources not yet started are reported as skipped.
   * @default true
   */
  continueOnSourceFailure?: boolean;
};

export type CrawlRunOptions = {
  /**
   * Cancels every in-flight fetch and the extraction pools.
   * The WorkItem being processed is not checkpointed.
   */
  signal?: AbortSignal;
};
