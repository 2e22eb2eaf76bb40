/**
 * Stages of one build, in order. `published` and `skipped` are the two
 * branches out of `archived`; both lead to `done`.
 */
export const BUILD_STAGES = ["start", "installed", "manifested", "archived", "published", "skipped", "done"] as const;

export type BuildStage = (typeof BUILD_STAGES)[number];

/**
 * Events that drive stage transitions.
 */
export type TransitionEvent = "success" | "fingerprint_new" | "fingerprint_known";

const TRANSITIONS: Record<BuildStage, Partial<Record<TransitionEvent, BuildStage>>> = {
  start: { success: "installed" },
  installed: { success: "manifested" },
  manifested: { success: "archived" },
  archived: { fingerprint_new: "published", fingerprint_known: "skipped" },
  published: { success: "done" },
  skipped: { success: "done" },
  done: {},
};

/**
 * Pure function: given current stage + event, return next stage.
 * @throws Error when the event is not valid in the current stage
 */
export function nextStage(current: BuildStage, event: TransitionEvent): BuildStage {
  const next = TRANSITIONS[current][event];
  if (!next) {
    throw new Error(`Invalid transition: ${current} --${event}-->`);
  }
  return next;
}
