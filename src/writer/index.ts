export { writeFeedFile } from "./write.js";
export { FeedWriteError } from "./errors.js";
