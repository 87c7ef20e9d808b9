import * as vscode from 'vscode';
import { SolutionService } from '../services/solution/SolutionService';
import { SolutionProjectsProvider } from '../views/SolutionProjectsProvider';
import type { IViewRegistryResult } from './interfaces';
import { Logger } from './utils/Logger';

/**
 * 视图注册管理器
 *
 * 创建 "Solution Projects" 树视图。视图允许多选，
 * 其选择即为删除命令的活动项目。
 */
export class ViewRegistry {
    private readonly logger = Logger.getInstance();

    constructor(private readonly context: vscode.ExtensionContext) {}

    public registerAllViews(solutionService: SolutionService): IViewRegistryResult {
        const solutionProjectsProvider = new SolutionProjectsProvider(solutionService);
        const solutionProjectsView = vscode.window.createTreeView('deleteProject.solutionProjects', {
            treeDataProvider: solutionProjectsProvider,
            canSelectMany: true,
            showCollapseAll: false
        });

        this.context.subscriptions.push(solutionProjectsProvider, solutionProjectsView);
        this.logger.debug('  ✓ 注册视图: deleteProject.solutionProjects');

        return { solutionProjectsProvider, solutionProjectsView };
    }
}
