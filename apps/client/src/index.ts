/**
 * WeeChat relay client
 */

export {
  RelaySession,
  SessionState,
  BUFFER_KEYS,
  LINE_KEYS,
  type SessionOptions,
  type SessionEvents,
  type SessionErrorEvent,
  type SessionErrorType,
  type DisconnectedEvent,
} from "./session/session.js";
export { DomainMirror, type MirrorEvents } from "./mirror/mirror.js";
export type { UpdateKind } from "./mirror/dispatch.js";
export type {
  BufferFields,
  Line,
  MirrorEvent,
  Nick,
  NickChange,
  RelayBuffer,
} from "./mirror/model.js";
export {
  config,
  connectOptionsSchema,
  parseConnectOptions,
  type ConnectOptions,
  type ConnectOptionsInput,
} from "./config.js";
export { Logger, LogLevel, logger } from "./observability/logger.js";

export { dial, type Dialer, type DialOptions } from "../../../packages/transport/src/dial.js";
export { ConnectionError } from "../../../packages/transport/src/errors.js";
export {
  IncompleteFrameError,
  MalformedFrameError,
  ProtocolError,
  TypeMismatchError,
} from "../../../packages/protocol/src/errors.js";
export { RelayMessage } from "../../../packages/protocol/src/message.js";
export { MessageFramer } from "../../../packages/protocol/src/framer.js";
export { encodeFrame } from "../../../packages/protocol/src/encoder.js";
export { stripColors } from "../../../packages/protocol/src/colors.js";
export { hexAndAscii } from "../../../packages/protocol/src/hexdump.js";
export type {
  HData,
  HDataKey,
  HDataRow,
  Hashtable,
  Info,
  Infolist,
  RelayArray,
  RelayObject,
} from "../../../packages/protocol/src/types.js";
