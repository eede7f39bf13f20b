export * from "./FileSystem";
export { FileSystemNode } from "./FileSystemNode";
