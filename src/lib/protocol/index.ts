export {
  MsgData,
  MsgResize,
  MsgExit,
  MsgHandshake,
  MsgError,
  HEADER_SIZE,
  RESIZE_PAYLOAD_SIZE,
  encodeFrame,
  decodeFrame,
  FrameDecoder,
  encodeData,
  encodeResize,
  parseResize,
  encodeExit,
  encodeError,
  frameTypeName,
} from "./frame.ts";
export type { Frame, KnownFrameType, WindowSize } from "./frame.ts";
export { FrameReader, DEFAULT_MAX_PAYLOAD } from "./reader.ts";
export type { FrameReaderOptions } from "./reader.ts";
export { parseHandshake, encodeHandshake, DEFAULT_ROWS, DEFAULT_COLS } from "./handshake.ts";
export type { HandshakeRequest, HandshakePayload, SessionCommand } from "./handshake.ts";
