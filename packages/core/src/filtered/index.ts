export type { Envelope } from "./FilteredHub.js";
export {
  createFilteredHub,
  createFilteredHub2,
  createFilteredHub3,
  createFilteredHub4,
  FilteredHub,
  FilteredHub2,
  FilteredHub3,
  FilteredHub4,
} from "./FilteredHub.js";
