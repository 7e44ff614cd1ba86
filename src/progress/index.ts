export {
  ProgressTracker,
  IllegalTransitionError,
  START_PERCENTAGE,
  type ProgressTrackerOptions,
  type StatusListener,
} from "./tracker.js";
