import * as vscode from 'vscode';
import * as path from 'path';
import { getConfiguredSolutionPath } from '../../config';
import { Logger } from '../../core/utils/Logger';
import { SolutionModel } from './SolutionModel';

const SELECTED_SOLUTION_KEY = 'deleteProject.selectedSolution';
const SOLUTION_EXCLUDE_GLOB = '**/{bin,obj,node_modules,.git}/**';
const MAX_SOLUTION_RESULTS = 50;

/**
 * 解决方案服务
 *
 * 负责定位并加载当前工作区使用的 .sln 文件：
 * 优先使用 deleteProject.solutionPath 配置，其次使用上次选择的解决方案，
 * 最后在工作区中查找（存在多个时取路径排序后的第一个，可通过命令切换）。
 */
export class SolutionService implements vscode.Disposable {
    private readonly logger = Logger.getInstance();
    private readonly _onDidChangeSolution = new vscode.EventEmitter<SolutionModel | undefined>();
    public readonly onDidChangeSolution = this._onDidChangeSolution.event;
    private solution: SolutionModel | undefined;
    private loading: Promise<SolutionModel | undefined> | undefined;

    constructor(private readonly context: vscode.ExtensionContext) {}

    public get current(): SolutionModel | undefined {
        return this.solution;
    }

    /**
     * 获取当前解决方案，未加载时先加载
     */
    public async getSolution(): Promise<SolutionModel | undefined> {
        if (this.solution) {
            return this.solution;
        }
        return this.reload();
    }

    /**
     * 重新从磁盘加载解决方案（并发调用共享同一次加载）
     */
    public reload(): Promise<SolutionModel | undefined> {
        if (!this.loading) {
            this.loading = this.loadSolution().finally(() => {
                this.loading = undefined;
            });
        }
        return this.loading;
    }

    /**
     * 让用户在工作区的多个解决方案中选择一个
     */
    public async selectSolution(): Promise<SolutionModel | undefined> {
        const candidates = await this.findWorkspaceSolutions();
        if (candidates.length === 0) {
            void vscode.window.showInformationMessage('No solution file (.sln) was found in the workspace.');
            return undefined;
        }

        const picked = await vscode.window.showQuickPick(
            candidates.map(candidate => ({
                label: path.basename(candidate),
                description: vscode.workspace.asRelativePath(candidate),
                solutionPath: candidate
            })),
            { placeHolder: 'Select the solution to work with' }
        );
        if (!picked) {
            return undefined;
        }

        await this.context.workspaceState.update(SELECTED_SOLUTION_KEY, picked.solutionPath);
        return this.reload();
    }

    public dispose(): void {
        this._onDidChangeSolution.dispose();
    }

    private async loadSolution(): Promise<SolutionModel | undefined> {
        const solutionPath = await this.resolveSolutionPath();
        if (!solutionPath) {
            this.setSolution(undefined);
            this.logger.debug('工作区中没有可用的解决方案');
            return undefined;
        }

        try {
            const solution = await SolutionModel.load(solutionPath);
            this.setSolution(solution);
            this.logger.info(`已加载解决方案 ${solution.name}`, { projects: solution.projects.length });
            return solution;
        } catch (error) {
            this.setSolution(undefined);
            this.logger.error(`加载解决方案失败: ${solutionPath}`, error);
            throw error;
        }
    }

    private setSolution(solution: SolutionModel | undefined): void {
        this.solution = solution;
        void vscode.commands.executeCommand('setContext', 'deleteProject.hasSolution', !!solution);
        this._onDidChangeSolution.fire(solution);
    }

    private async resolveSolutionPath(): Promise<string | undefined> {
        const configured = getConfiguredSolutionPath();
        if (configured) {
            return configured;
        }

        const remembered = this.context.workspaceState.get<string>(SELECTED_SOLUTION_KEY);
        const candidates = await this.findWorkspaceSolutions();
        if (remembered && candidates.includes(remembered)) {
            return remembered;
        }
        return candidates[0];
    }

    private async findWorkspaceSolutions(): Promise<string[]> {
        if (!vscode.workspace.workspaceFolders) {
            return [];
        }
        const uris = await vscode.workspace.findFiles('**/*.sln', SOLUTION_EXCLUDE_GLOB, MAX_SOLUTION_RESULTS);
        return uris.map(uri => uri.fsPath).sort((a, b) => a.localeCompare(b));
    }
}
