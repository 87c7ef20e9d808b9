import * as vscode from 'vscode';
import { ProjectCommandRegistry } from './commands/ProjectCommandRegistry';
import { ViewRegistry } from './ViewRegistry';
import { ConfigurationManager } from './ConfigurationManager';
import { type IViewRegistryResult, InitializationPhase } from './interfaces';
import { Logger } from './utils/Logger';
import { ProjectDeleter } from '../services/ProjectDeleter';
import { SolutionService } from '../services/solution/SolutionService';
import { VsCodeMessageBoxService } from '../services/dialog/VsCodeMessageBoxService';
import { ConfiguredDirectoryRemover } from '../services/fs/ConfiguredDirectoryRemover';

const OUTPUT_CHANNEL_NAME = 'Delete Project';
const SHOW_LOG_ACTION = 'Show Log';

/**
 * 扩展初始化器
 *
 * 按顺序完成：配置监听、解决方案加载、视图注册、命令注册。
 * 删除器在这里显式创建一次，生命周期与扩展激活期一致。
 *
 * @example
 * ```typescript
 * const initializer = new ExtensionInitializer(context);
 * await initializer.initialize();
 * ```
 */
export class ExtensionInitializer {
    private readonly context: vscode.ExtensionContext;
    private readonly logger: Logger;
    private readonly isDevelopment: boolean;
    private readonly solutionService: SolutionService;
    private readonly projectDeleter: ProjectDeleter;
    private readonly viewRegistry: ViewRegistry;
    private readonly configurationManager: ConfigurationManager;

    constructor(context: vscode.ExtensionContext) {
        this.context = context;
        this.isDevelopment = context.extensionMode === vscode.ExtensionMode.Development;

        this.logger = Logger.getInstance();
        this.logger.attachChannel(vscode.window.createOutputChannel(OUTPUT_CHANNEL_NAME));
        this.logger.initialize(this.isDevelopment);

        this.solutionService = new SolutionService(context);
        this.projectDeleter = new ProjectDeleter(
            new VsCodeMessageBoxService(vscode.window),
            new ConfiguredDirectoryRemover(),
            this.logger
        );
        this.viewRegistry = new ViewRegistry(context);
        this.configurationManager = new ConfigurationManager(context, this.solutionService);

        // 注册到 context 订阅中，确保扩展停用时清理资源
        context.subscriptions.push(this.solutionService, {
            dispose: () => this.logger.dispose()
        });
    }

    /**
     * 初始化扩展
     *
     * @throws {Error} 当任何初始化阶段失败时抛出
     */
    public async initialize(): Promise<void> {
        const startTime = Date.now();
        this.logger.info('🚀 开始初始化 Delete Project 扩展...');

        try {
            this.runPhase(InitializationPhase.CONFIGURATION, () =>
                this.configurationManager.initializeConfiguration(this.isDevelopment));

            await this.loadSolutionSafely();

            const views = this.runPhase(InitializationPhase.VIEWS, () =>
                this.viewRegistry.registerAllViews(this.solutionService));

            this.runPhase(InitializationPhase.COMMANDS, () => this.registerCommands(views));

            this.logger.info('✅ 扩展初始化完成', { duration: `${Date.now() - startTime}ms` });
        } catch (error) {
            const errorMessage = formatErrorMessage(error);
            this.logger.error(`❌ 扩展初始化失败 (耗时: ${Date.now() - startTime}ms)`, error);

            void vscode.window.showErrorMessage(`Delete Project failed to start: ${errorMessage}`, SHOW_LOG_ACTION)
                .then(selection => {
                    if (selection === SHOW_LOG_ACTION) {
                        this.logger.show();
                    }
                });

            throw new Error(`扩展初始化失败: ${errorMessage}`);
        }
    }

    private registerCommands(views: IViewRegistryResult): void {
        const registry = new ProjectCommandRegistry(this.context, this.solutionService, this.projectDeleter, views);
        registry.registerCommands();
    }

    /**
     * 加载解决方案失败不影响激活：视图显示欢迎内容，用户可以稍后刷新
     */
    private async loadSolutionSafely(): Promise<void> {
        try {
            await this.solutionService.reload();
            this.logger.info('  ✓ 解决方案加载完成');
        } catch (error) {
            this.logger.warn(`  ✗ 解决方案加载失败: ${formatErrorMessage(error)}`);
        }
    }

    private runPhase<T>(phase: InitializationPhase, action: () => T): T {
        try {
            const result = action();
            this.logger.info(`  ✓ ${phase} 阶段完成`);
            return result;
        } catch (error) {
            this.logger.error(`  ✗ ${phase} 阶段失败`, error);
            throw new Error(`${phase}阶段失败: ${formatErrorMessage(error)}`);
        }
    }
}

function formatErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    } else if (typeof error === 'string') {
        return error;
    }
    return '未知错误类型';
}
