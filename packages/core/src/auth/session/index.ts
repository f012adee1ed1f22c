export { PendingStateSet } from "./pending-state-set.js";
