import * as vscode from 'vscode';
import { shouldSaveSolutionAfterRemove } from '../../config';
import type { ProjectDeleter } from '../../services/ProjectDeleter';
import { ProjectDeletionRunner } from '../../services/ProjectDeletionRunner';
import type { SolutionModel } from '../../services/solution/SolutionModel';
import type { SolutionService } from '../../services/solution/SolutionService';
import type { IViewRegistryResult } from '../interfaces';
import { resolveActiveProjects } from './activeProjects';
import { BaseCommandRegistry } from './BaseCommandRegistry';

/**
 * 项目相关命令注册器
 *
 * 负责删除项目、刷新解决方案和切换解决方案三个命令。
 */
export class ProjectCommandRegistry extends BaseCommandRegistry {
    private readonly deletionRunner: ProjectDeletionRunner<SolutionModel>;

    constructor(
        context: vscode.ExtensionContext,
        private readonly solutionService: SolutionService,
        projectDeleter: ProjectDeleter,
        private readonly views: IViewRegistryResult
    ) {
        super(context);
        this.deletionRunner = new ProjectDeletionRunner<SolutionModel>(projectDeleter, {
            getSolution: () => this.solutionService.getSolution(),
            shouldSaveSolution: shouldSaveSolutionAfterRemove,
            notifyNoSolution: () => {
                void vscode.window.showWarningMessage('No solution is loaded. Open a folder containing a .sln file first.');
            },
            refresh: () => this.views.solutionProjectsProvider.refresh()
        }, this.logger);
    }

    public registerCommands(): void {
        this.registerCommand(
            'deleteProject.deleteSelectedProjects',
            async (...args) => {
                await this.deletionRunner.run(solution =>
                    resolveActiveProjects(solution, args, this.views.solutionProjectsView.selection, this.logger));
            },
            'Delete Project'
        );

        this.registerCommand(
            'deleteProject.refreshSolution',
            async () => {
                await this.solutionService.reload();
            },
            'Refresh Solution'
        );

        this.registerCommand(
            'deleteProject.selectSolution',
            async () => {
                await this.solutionService.selectSolution();
            },
            'Select Solution'
        );
    }
}
