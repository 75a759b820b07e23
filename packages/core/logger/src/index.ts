import {Logger} from './Logger';

export {Logger} from './Logger';
export type {LogEvent, LogLevel, LoggerOptions, IDisposable} from './Logger';

const logger: Logger = new Logger();

export default logger;
