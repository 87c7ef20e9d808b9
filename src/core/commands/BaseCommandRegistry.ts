import * as vscode from 'vscode';
import { Logger } from '../utils/Logger';

/**
 * 基础命令注册器
 *
 * 为所有命令注册器提供通用功能和基础设施，
 * 包括上下文管理和错误处理机制。
 *
 * @abstract
 */
export abstract class BaseCommandRegistry {
    protected readonly context: vscode.ExtensionContext;
    protected readonly logger: Logger;

    constructor(context: vscode.ExtensionContext) {
        this.context = context;
        this.logger = Logger.getInstance();
    }

    /**
     * 注册命令的通用方法
     *
     * 命令回调抛出的异常会被记录并以错误消息提示用户，不会传播到宿主。
     *
     * @param commandId 命令标识符
     * @param callback 命令回调函数
     * @param errorContext 错误上下文描述
     */
    protected registerCommand(
        commandId: string,
        callback: (...args: unknown[]) => unknown,
        errorContext: string = commandId
    ): void {
        try {
            const disposable = vscode.commands.registerCommand(commandId, async (...args: unknown[]) => {
                try {
                    await callback(...args);
                } catch (error) {
                    this.logger.error(`命令 ${commandId} 执行失败`, error);
                    void vscode.window.showErrorMessage(`${errorContext} failed: ${error instanceof Error ? error.message : String(error)}`);
                }
            });

            this.context.subscriptions.push(disposable);
            this.logger.debug(`  ✓ 注册命令: ${commandId}`);

        } catch (error) {
            this.logger.error(`注册命令 ${commandId} 失败`, error);
            throw new Error(`命令注册失败: ${commandId}`);
        }
    }

    /**
     * 注册此类别的所有命令
     *
     * @abstract
     */
    public abstract registerCommands(): void;
}
