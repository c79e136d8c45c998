export { aggregate } from "./aggregator";
export { collectCategoryBuffers } from "./collector";
export type { CategoryBuffers } from "./types";
