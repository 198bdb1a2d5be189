/**
 * Per-campaign serialization boundary.
 *
 * Tasks for the same campaign run one at a time in arrival order; different
 * campaigns never wait on each other. A failing task does not stall the tasks
 * queued behind it.
 */
export class RoomQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(campaignId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(campaignId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(campaignId, tail);
    // Drop the entry once this task is the last one queued
    void tail.then(() => {
      if (this.tails.get(campaignId) === tail) {
        this.tails.delete(campaignId);
      }
    });
    return result;
  }

  /** Campaigns with work queued or running. */
  activeCampaigns(): string[] {
    return [...this.tails.keys()];
  }
}
