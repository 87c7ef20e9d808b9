import type { ProjectDeletionFailure, ProjectRef } from '../models/solution';

export const DELETING_PROJECT_MESSAGE =
    'Project {0} will be removed from the solution and its directory will be deleted from disk. Continue?';

export const DELETING_PROJECTS_MESSAGE =
    'Projects {0} will be removed from the solution and their directories will be deleted from disk. Continue?';

export const SAME_DIRECTORY_MESSAGE = 'solution and project share the same directory';

export const ROOT_DIRECTORY_MESSAGE = 'refusing to delete the root directory of the file system';

function quote(name: string): string {
    return `'${name}'`;
}

/**
 * 生成删除确认消息：单个项目使用单数形式，多个项目按原顺序以 ", " 连接
 */
export function formatConfirmationMessage(projects: readonly ProjectRef[]): string {
    if (projects.length === 1) {
        return DELETING_PROJECT_MESSAGE.replace('{0}', () => quote(projects[0].name));
    }
    const names = projects.map(project => quote(project.name)).join(', ');
    return DELETING_PROJECTS_MESSAGE.replace('{0}', () => names);
}

/**
 * 生成结果报告：每个失败项目一行 "'名称': 错误信息"
 */
export function formatFailureReport(failures: readonly ProjectDeletionFailure[]): string {
    return failures.map(failure => `${quote(failure.project.name)}: ${failure.message}`).join('\n');
}
