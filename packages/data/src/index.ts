export * from "./types";
export { loadDataset, parseCloseValue, parseDataset } from "./dataset";
