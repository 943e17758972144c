export {
  define,
  Int32,
  Uint32,
  Int64,
  Uint64,
  Bool,
  opaque,
  varOpaque,
  xdrString,
  fixedArray,
  varArray,
  option,
  xdrEnum,
  toXdr,
  decodeXdr,
  fromXdr,
  type XdrType,
  type XdrValue,
} from "./codec.js";
export { XdrReader } from "./reader.js";
export { XdrWriter } from "./writer.js";
export { toXdrBase64, fromXdrBase64 } from "./base64.js";
