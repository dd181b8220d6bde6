export { rollingMean } from "./sma";
