export * from "./DirectoryIndex";
export { getHighestNumber } from "./HighWaterMark";
