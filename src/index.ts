export { Bytes, toBuffer } from './core/bytes';
export type { Span } from './core/bytes';
export { HttpParseError, ParseErrorKind } from './core/errors';
export { Request, parseHeaders, parseRequest } from './core/httpParser';
export type { HttpMinorVersion, ParserConfig } from './core/httpParser';
export { PARTIAL, complete, fail, isComplete, isFailure, isPartial, unwrap } from './core/status';
export type { CompleteResult, FailureResult, ParseResult, PartialResult } from './core/status';
export {
  HEADER_VALUE_MAP,
  TOKEN_MAP,
  URI_MAP,
  byteMap,
  classify,
  isHeaderNameToken,
  isHeaderValueToken,
  isMethodToken,
  isUriToken,
} from './core/tokens';
export type { ByteSpec, ByteTable } from './core/tokens';
export { EMPTY_HEADER, HeaderList, headerValueToString } from './entities/http';
export type { Header } from './entities/http';
