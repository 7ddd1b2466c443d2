/**
 * Search Provider implementations
 */

export { BraveSearchProvider } from "./brave-provider";
export type { SearchProvider } from "../../interfaces/search-provider";
