import * as vscode from 'vscode';
import * as path from 'path';
import { SolutionProjectRef } from '../services/solution/SolutionModel';
import { SolutionService } from '../services/solution/SolutionService';

/**
 * 解决方案项目节点
 */
export class ProjectTreeItem extends vscode.TreeItem {
    constructor(public readonly project: SolutionProjectRef) {
        super(project.name, vscode.TreeItemCollapsibleState.None);
        this.resourceUri = vscode.Uri.file(project.filePath);
        this.description = vscode.workspace.asRelativePath(path.dirname(project.filePath));
        this.tooltip = project.filePath;
        this.iconPath = new vscode.ThemeIcon('project');
        // 与 package.json 中 view/item/context 的 when 条件对应
        this.contextValue = 'solutionProject';
        this.command = {
            command: 'vscode.open',
            title: 'Open Project File',
            arguments: [this.resourceUri]
        };
    }
}

/**
 * "Solution Projects" 视图：平铺列出当前解决方案中的项目（不含解决方案文件夹）
 */
export class SolutionProjectsProvider implements vscode.TreeDataProvider<ProjectTreeItem>, vscode.Disposable {
    private _onDidChangeTreeData = new vscode.EventEmitter<ProjectTreeItem | undefined | null | void>();
    readonly onDidChangeTreeData: vscode.Event<ProjectTreeItem | undefined | null | void> = this._onDidChangeTreeData.event;
    private readonly subscription: vscode.Disposable;

    constructor(private readonly solutionService: SolutionService) {
        this.subscription = solutionService.onDidChangeSolution(() => this.refresh());
    }

    refresh(): void {
        this._onDidChangeTreeData.fire();
    }

    getTreeItem(element: ProjectTreeItem): vscode.TreeItem {
        return element;
    }

    async getChildren(element?: ProjectTreeItem): Promise<ProjectTreeItem[]> {
        if (element) {
            return [];
        }
        // 未找到解决方案时返回空数组，由 package.json 中的 viewsWelcome 提示用户
        const solution = this.solutionService.current;
        if (!solution) {
            return [];
        }
        return solution.projects.map(project => new ProjectTreeItem(project));
    }

    dispose(): void {
        this.subscription.dispose();
        this._onDidChangeTreeData.dispose();
    }
}
