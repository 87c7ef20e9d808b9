import { Logger } from '../core/utils/Logger';
import type { ProjectDeletionFailure, ProjectDeletionResult, ProjectRef, SolutionRef } from '../models/solution';
import { getDirectoryPath, isRootDirectory, isSameDirectory } from '../utils/pathUtils';
import type { MessageBoxService } from './dialog/MessageBoxService';
import type { DirectoryRemover } from './fs/DirectoryRemover';
import {
    formatConfirmationMessage,
    formatFailureReport,
    ROOT_DIRECTORY_MESSAGE,
    SAME_DIRECTORY_MESSAGE
} from './deletionMessages';

/**
 * 项目删除器
 *
 * 确认后逐个把项目从解决方案中移除，再删除项目目录。
 * 单个项目的失败不会中断整批操作，所有失败在最后汇总到一个对话框中。
 * 已经从解决方案中移除的项目不会因后续目录删除失败而回滚。
 *
 * @example
 * ```typescript
 * const deleter = new ProjectDeleter(new VsCodeMessageBoxService(vscode.window), new NodeDirectoryRemover());
 * await deleter.confirmAndDelete(selectedProjects, solution);
 * ```
 */
export class ProjectDeleter {
    private readonly logger: Logger;

    constructor(
        private readonly messageBox: MessageBoxService,
        private readonly directoryRemover: DirectoryRemover,
        logger?: Logger
    ) {
        this.logger = logger ?? Logger.getInstance();
    }

    /**
     * 确认并删除选中的项目
     *
     * 项目为空时直接返回，不弹出任何对话框。
     * 用户取消确认时不产生任何副作用。
     *
     * @param activeProjects 当前选中的项目，按选择顺序
     * @param solution 项目所属的解决方案
     */
    public async confirmAndDelete(
        activeProjects: readonly ProjectRef[],
        solution: SolutionRef
    ): Promise<ProjectDeletionResult> {
        const projects = distinct(activeProjects);
        const result: ProjectDeletionResult = {
            confirmed: false,
            detached: [],
            deleted: [],
            failures: [],
            critical: false
        };

        if (projects.length === 0) {
            this.logger.debug('没有选中的项目，跳过删除');
            return result;
        }

        const answer = await this.messageBox.show({
            message: formatConfirmationMessage(projects),
            icon: 'warning',
            buttons: 'okCancel',
            defaultButton: 'first'
        });

        if (answer !== 'ok') {
            this.logger.info('用户取消了项目删除');
            return result;
        }
        result.confirmed = true;

        const solutionDir = getDirectoryPath(solution.filePath);

        for (const project of projects) {
            try {
                const projectDir = getDirectoryPath(project.filePath);

                // 先从解决方案移除，再判断目录；同目录时项目仍然会被移除
                await solution.remove(project);
                result.detached.push(project);

                if (isSameDirectory(solutionDir, projectDir)) {
                    result.failures.push({ project, message: SAME_DIRECTORY_MESSAGE, isException: false });
                    this.logger.warn(`项目 ${project.name} 与解决方案位于同一目录，未删除目录`, { projectDir });
                } else if (isRootDirectory(projectDir)) {
                    throw new Error(ROOT_DIRECTORY_MESSAGE);
                } else {
                    await this.directoryRemover.removeDirectory(projectDir);
                    result.deleted.push(project);
                    this.logger.info(`已删除项目 ${project.name}`, { projectDir });
                }
            } catch (error) {
                result.failures.push({ project, message: getErrorMessage(error), isException: true });
                result.critical = true;
                this.logger.error(`删除项目 ${project.name} 失败`, error);
            }
        }

        if (result.failures.length > 0) {
            await this.showReport(result.failures, result.critical);
        }

        return result;
    }

    private async showReport(failures: readonly ProjectDeletionFailure[], critical: boolean): Promise<void> {
        await this.messageBox.show({
            message: formatFailureReport(failures),
            icon: critical ? 'critical' : 'warning',
            buttons: 'ok',
            defaultButton: 'first'
        });
    }
}

function distinct(projects: readonly ProjectRef[]): ProjectRef[] {
    return [...new Set(projects)];
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
