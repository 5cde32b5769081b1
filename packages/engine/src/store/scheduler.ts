/**
 * Runs a task on a later turn of the host loop, never inline.
 */
export type TaskScheduler = (task: () => void) => void;

export const microtaskScheduler: TaskScheduler = (task) => {
  queueMicrotask(task);
};
