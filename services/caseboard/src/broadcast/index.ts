export {
  UpdateBroadcaster,
  toBlackboardEvent,
  type GraphMutation,
  type MutationAction,
  type GraphUpdateMessage,
  type GraphSubscriber,
  type BroadcasterOptions,
} from "./broadcaster.js";
export { SubscriberSet, type Subscriber } from "./subscribers.js";
