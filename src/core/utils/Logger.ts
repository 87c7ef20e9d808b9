/**
 * 日志级别枚举
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * 日志输出通道
 *
 * vscode.OutputChannel 在结构上满足该接口，
 * 测试环境中可以传入任意实现。
 */
export interface LogChannel {
    appendLine(value: string): void;
    show(): void;
    dispose(): void;
}

/**
 * 将配置中的级别名称解析为 LogLevel，无法识别时返回 undefined
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    switch ((name ?? '').toLowerCase()) {
        case 'debug':
            return LogLevel.DEBUG;
        case 'info':
            return LogLevel.INFO;
        case 'warn':
            return LogLevel.WARN;
        case 'error':
            return LogLevel.ERROR;
        default:
            return undefined;
    }
}

/**
 * 日志管理器
 *
 * 提供结构化的日志记录功能，支持不同的日志级别。
 * 输出通道在激活时由扩展挂接；挂接之前（例如纯 Mocha 环境）回退到控制台。
 *
 * @example
 * ```typescript
 * const logger = Logger.getInstance();
 * logger.info('开始删除项目');
 * logger.error('删除失败', error);
 * ```
 */
export class Logger {
    private static instance: Logger | undefined;
    private outputChannel: LogChannel | null = null;
    private logLevel: LogLevel;
    private isDevelopment = false;

    private constructor() {
        this.logLevel = LogLevel.INFO;
    }

    /**
     * 初始化 Logger
     * @param isDevelopment 扩展是否运行在开发模式
     */
    public initialize(isDevelopment: boolean): void {
        this.isDevelopment = isDevelopment;
        if (this.isDevelopment) {
            this.setLogLevel(LogLevel.DEBUG);
            this.info('开发模式已激活，日志级别设置为 DEBUG。');
        }
    }

    /**
     * 获取日志管理器单例实例
     */
    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    /**
     * 挂接输出通道，替换之前挂接的通道
     */
    public attachChannel(channel: LogChannel): void {
        if (this.outputChannel && this.outputChannel !== channel) {
            this.outputChannel.dispose();
        }
        this.outputChannel = channel;
    }

    public setLogLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    public debug(message: string, data?: unknown): void {
        this.log(LogLevel.DEBUG, message, data);
    }

    public info(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, message, data);
    }

    public warn(message: string, data?: unknown): void {
        this.log(LogLevel.WARN, message, data);
    }

    /**
     * 记录错误日志
     *
     * @param message 日志消息
     * @param error 错误对象或附加数据
     */
    public error(message: string, error?: unknown): void {
        this.log(LogLevel.ERROR, message, error);
    }

    /**
     * 显示输出通道
     */
    public show(): void {
        if (this.outputChannel) {
            this.outputChannel.show();
        }
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        if (level < this.logLevel) {
            return;
        }

        const timestamp = new Date().toISOString();
        const levelText = LogLevel[level];
        const logMessage = `[${timestamp}] [${levelText}] ${message}`;

        if (this.outputChannel) {
            this.outputChannel.appendLine(logMessage);
            if (data !== undefined) {
                this.outputChannel.appendLine(`  Data: ${formatData(data)}`);
            }
        }

        // 开发模式或尚未挂接输出通道时，同时输出到控制台
        if (this.isDevelopment || !this.outputChannel) {
            switch (level) {
                case LogLevel.DEBUG:
                    console.debug(logMessage, data ?? '');
                    break;
                case LogLevel.INFO:
                    console.info(logMessage, data ?? '');
                    break;
                case LogLevel.WARN:
                    console.warn(logMessage, data ?? '');
                    break;
                case LogLevel.ERROR:
                    console.error(logMessage, data ?? '');
                    break;
            }
        }
    }

    /**
     * 清理资源
     */
    public dispose(): void {
        if (this.outputChannel) {
            this.outputChannel.dispose();
            this.outputChannel = null;
        }
    }
}

function formatData(data: unknown): string {
    // Error 的 message/stack 不可枚举，JSON.stringify 会得到 {}
    if (data instanceof Error) {
        return data.stack ?? `${data.name}: ${data.message}`;
    }
    try {
        return JSON.stringify(data, null, 2) ?? String(data);
    } catch {
        return String(data);
    }
}
