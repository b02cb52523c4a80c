export {
  AlignmentTracker,
  type AlignmentTrackerOptions,
  type RunAlignmentOptions,
  type TrackerHistoryEntry,
} from "./alignment-tracker.js";
