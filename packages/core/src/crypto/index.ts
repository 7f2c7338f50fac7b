export { digestBuffer, digestStream } from "./checksum";
export type { DigestAlgorithm } from "./checksum";
