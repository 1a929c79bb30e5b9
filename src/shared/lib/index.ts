export { logger, setLoggerOptions } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export {
  TesterError,
  ConfigError,
  ArgumentError,
  UnknownModeError,
  DiscoveryError,
  FixtureHeaderError,
  DescriptorError,
  DuplicateTestNameError,
  TestFailedError,
} from './errors.js';
