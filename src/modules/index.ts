/**
 * Run modules export
 */

export { buildInitialRequest, decodePage, PexelsPageSource } from "./pager";
export { fetchImageBytes, persist, processPhoto } from "./fetcher";
export { harvest, processPage, createRunState } from "./harvester";
export { stats } from "./stats";
