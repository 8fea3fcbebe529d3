export { InsightsClient, buildHeaders, type InsightsClientOptions } from "./client.js";
export { assertAuthenticated, assertEnvelope, parseListings } from "./envelope.js";
export {
  OPERATIONS,
  RELATIVE_DAY_SHIFT,
  buildListingsPayload,
  buildMetricPayload,
  relativeOffset,
  sliceWindow,
} from "./payloads.js";
