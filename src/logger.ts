import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

const MAX_SIZE = 5 * 1024 * 1024; // 5MB

type LogArg = unknown;

function resolveLogDir(): string {
    return process.env.FACE_ENGINE_LOG_DIR || path.join(os.homedir(), '.face-moment-engine', 'logs');
}

let logFile: string | null = null;
let logStream: fs.WriteStream | null = null;

function openStream(): fs.WriteStream | null {
    if (logStream) return logStream;
    try {
        const logDir = resolveLogDir();
        if (!fs.existsSync(logDir)) {
            fs.mkdirSync(logDir, { recursive: true });
        }
        logFile = path.join(logDir, 'engine.log');
        logStream = fs.createWriteStream(logFile, { flags: 'a' });
        logStream.on('error', (err) => {
            console.error('Log stream failed, file logging disabled:', err);
            logStream = null;
        });
    } catch (err) {
        console.error('Failed to open log file:', err);
        logStream = null;
    }
    return logStream;
}

function rotateLogIfNeeded() {
    if (!logFile || !logStream) return;
    try {
        if (fs.existsSync(logFile)) {
            const stats = fs.statSync(logFile);
            if (stats.size > MAX_SIZE) {
                logStream.end();
                const oldLog = logFile + '.old';
                if (fs.existsSync(oldLog)) fs.unlinkSync(oldLog);
                fs.renameSync(logFile, oldLog);
                logStream = fs.createWriteStream(logFile, { flags: 'a' });
            }
        }
    } catch (err) {
        console.error('Failed to rotate logs:', err);
    }
}

function getTimestamp() {
    return new Date().toISOString();
}

export function formatMsg(level: string, ...args: LogArg[]) {
    const msg = args.map(arg => {
        if (arg instanceof Error) return arg.stack ?? arg.message;
        return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
    }).join(' ');
    return `[${getTimestamp()}] [${level}] ${msg}\n`;
}

function write(level: string, args: LogArg[]) {
    if (!openStream()) return;
    rotateLogIfNeeded();
    logStream?.write(formatMsg(level, ...args));
}

const logger = {
    info: (...args: LogArg[]) => {
        console.log(...args);
        write('INFO', args);
    },
    warn: (...args: LogArg[]) => {
        console.warn(...args);
        write('WARN', args);
    },
    error: (...args: LogArg[]) => {
        console.error(...args);
        write('ERROR', args);
    },
    debug: (...args: LogArg[]) => {
        if (process.env.FACE_ENGINE_DEBUG) console.log(...args);
        write('DEBUG', args);
    },
    getLogPath: () => logFile ?? path.join(resolveLogDir(), 'engine.log')
};

export default logger;
