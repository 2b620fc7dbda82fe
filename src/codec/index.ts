export { encode, decode, columnType, defaultValue } from './value-codec.js'
