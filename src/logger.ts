export interface Logger {
    info(msg: string): void;
    warn(msg: string): void;
    error(msg: string, err?: unknown): void;
}

const line = (level: string, module: string, msg: string) => `${new Date().toISOString()} - ${level} - ${module} - ${msg}`;

/**
 * Logger writing to the console in the format
 * `<timestamp> - <LEVEL> - <module> - <message>`.
 */
export const createConsoleLogger = (module: string): Logger => {
    return {
        info: (msg) => console.log(line("INFO", module, msg)),
        warn: (msg) => console.log(line("WARNING", module, msg)),
        error: (msg, err) => {
            if (err === undefined) {
                console.error(line("ERROR", module, msg));
            } else {
                console.error(line("ERROR", module, msg), err);
            }
        },
    };
};
