export type {
  ObservationHandle,
  ObservationChannel,
  MutationSnapshot,
  MutationChannelConfig,
  ProbeState,
} from "./types";
export { DEFAULT_BOUNDARY_TIMEOUT_MS, mutationSnapshotSchema } from "./types";

export { MutationChannel } from "./mutation-channel";
export { CHANNEL_SCRIPT } from "./channel-script";
