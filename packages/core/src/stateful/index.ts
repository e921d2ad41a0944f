export { createReactiveHub, ReactiveHub } from "./ReactiveHub.js";
export { RetainingHub } from "./RetainingHub.js";
export { createStatefulHub, StatefulHub } from "./StatefulHub.js";
export type { StateSubscribeOptions } from "./types.js";
