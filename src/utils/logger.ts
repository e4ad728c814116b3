import winston, { format } from 'winston';
import { config } from '../config/env';

const transports = [
    new winston.transports.Console(),
    ...(config.logFile ? [new winston.transports.File({ filename: config.logFile })] : []),
];

const logger = winston.createLogger({
    level: config.logLevel,
    format: format.combine(
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.simple()
      ),
    transports,
});

export default logger;
