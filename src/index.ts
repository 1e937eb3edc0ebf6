export { parse, safeParse } from './dotenv/parse';
export { parseLine } from './dotenv/parseLine';
export { expandVariables } from './dotenv/expandVariables';
export { Scanner, END_OF_INPUT, isKeyChar, isKeyStartChar } from './dotenv/Scanner';
export { DotenvParseError, ParseErrorCode } from './dotenv/DotenvParseError';
export type { ParsedLine } from './dotenv/ParsedLine';
export type { QuoteContext } from './dotenv/QuoteContext';
export type { EnvMap } from './dotenv/EnvMap';
export { ok, err } from './dotenv/Result';
export type { Result } from './dotenv/Result';

export type { EnvironmentAccessor } from './env/EnvironmentAccessor';
export { processEnvironment } from './env/processEnvironment';
export { createMemoryEnvironment } from './env/createMemoryEnvironment';
export { applyEnv } from './env/applyEnv';
export type { ApplyOptions } from './env/applyEnv';
export { loadEnvFile, loadEnvFromStream, loadAndApply } from './env/loadEnvFile';
export { EnvLoadError } from './env/EnvLoadError';
export { EnvAccessError } from './env/EnvAccessError';
export { EnvBindError } from './env/EnvBindError';
export type { EnvBindErrorCode } from './env/EnvBindError';
export type { EnvCodec } from './env/EnvCodec';
export { codecs } from './env/codecs';
export type { CodecName } from './env/codecs';
export { parseDuration, formatDuration } from './env/duration';
export {
	createEnvReader,
	setEnv,
	unsetEnv,
	hasEnv,
} from './env/createEnvReader';
export type { EnvReader, TypedAccessor } from './env/createEnvReader';
export { EnvField, envField } from './env/EnvField';
export type { EnvSchema, InferEnv } from './env/EnvField';
export { bindEnv, marshalEnv } from './env/bindEnv';
export type { BindOptions } from './env/bindEnv';
export { serializeEnv, needsQuoting, quoteValue } from './env/serializeEnv';
export { writeEnvFile, marshalToFile } from './env/writeEnvFile';
