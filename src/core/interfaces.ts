import * as vscode from 'vscode';
import type { ProjectTreeItem, SolutionProjectsProvider } from '../views/SolutionProjectsProvider';

/**
 * 视图注册结果
 *
 * 命令注册器通过它读取当前选择并在删除后刷新视图。
 */
export interface IViewRegistryResult {
    solutionProjectsProvider: SolutionProjectsProvider;
    solutionProjectsView: vscode.TreeView<ProjectTreeItem>;
}

/**
 * 初始化阶段枚举
 */
export enum InitializationPhase {
    CONFIGURATION = 'configuration',
    VIEWS = 'views',
    COMMANDS = 'commands'
}
