import * as vscode from 'vscode';
import { CONFIG_SECTION, getConfiguredLogLevel } from '../config';
import { SolutionService } from '../services/solution/SolutionService';
import { Logger } from './utils/Logger';

/**
 * 配置监听管理器
 *
 * 监听 deleteProject.* 配置变化以及 .sln 文件变化：
 * - logLevel 变化时更新 Logger
 * - solutionPath 变化或解决方案文件被修改时重新加载解决方案
 */
export class ConfigurationManager {
    private readonly context: vscode.ExtensionContext;
    private readonly logger: Logger;

    constructor(context: vscode.ExtensionContext, private readonly solutionService: SolutionService) {
        this.context = context;
        this.logger = Logger.getInstance();
    }

    /**
     * 初始化配置监听
     *
     * @throws {Error} 当监听器设置失败时抛出错误
     */
    public initializeConfiguration(isDevelopment: boolean): void {
        try {
            if (!isDevelopment) {
                this.logger.setLogLevel(getConfiguredLogLevel());
            }
            this.setupConfigurationListener();
            this.setupSolutionFileWatcher();
            this.logger.info('✓ 配置监听器设置完成');
        } catch (error) {
            this.logger.error('✗ 配置监听器设置失败', error);
            throw new Error(`配置监听器初始化失败: ${error instanceof Error ? error.message : '未知错误'}`);
        }
    }

    private setupConfigurationListener(): void {
        const configListener = vscode.workspace.onDidChangeConfiguration(e => {
            if (e.affectsConfiguration(`${CONFIG_SECTION}.logLevel`)) {
                this.logger.setLogLevel(getConfiguredLogLevel());
            }
            if (e.affectsConfiguration(`${CONFIG_SECTION}.solutionPath`)) {
                this.reloadSolution('solutionPath 配置已变化');
            }
        });

        this.context.subscriptions.push(configListener);
    }

    /**
     * 外部修改 .sln（例如 dotnet sln 命令）后重新加载，保持视图与磁盘一致
     */
    private setupSolutionFileWatcher(): void {
        const watcher = vscode.workspace.createFileSystemWatcher('**/*.sln');
        const onSolutionFileEvent = (uri: vscode.Uri) => {
            const current = this.solutionService.current;
            if (!current || current.filePath === uri.fsPath) {
                this.reloadSolution(`解决方案文件变化: ${uri.fsPath}`);
            }
        };

        this.context.subscriptions.push(
            watcher,
            watcher.onDidCreate(onSolutionFileEvent),
            watcher.onDidChange(onSolutionFileEvent),
            watcher.onDidDelete(onSolutionFileEvent)
        );
    }

    private reloadSolution(reason: string): void {
        this.logger.debug(`重新加载解决方案：${reason}`);
        this.solutionService.reload().catch(error => {
            this.logger.error('重新加载解决方案失败', error);
        });
    }
}
