export type SerialQueue = {
  enqueue(task: () => Promise<void>): void;
};

/**
 * Runs tasks one after another in arrival order. A task that rejects is
 * handed to `onError` and the queue moves on to the next one.
 */
export function createSerialQueue(onError: (error: unknown) => void): SerialQueue {
  let tail: Promise<void> = Promise.resolve();

  return {
    enqueue(task) {
      tail = tail.then(task).catch(onError);
    }
  };
}
