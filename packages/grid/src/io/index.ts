/**
 * IO module - byte streams consumed by the codecs.
 */

export { BufferByteReader, BufferByteWriter } from "./buffer-stream";
export {
  FileByteReader,
  FileByteWriter,
  loadFromFile,
  saveToFile,
} from "./file-stream";
export type { ByteReader, ByteWriter } from "./types";
