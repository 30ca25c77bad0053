export { parseTraceLine, parseTraceText } from './parser'
export { readTraceFile, readTraceText } from './reader'
