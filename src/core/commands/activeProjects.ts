import type { Logger } from '../utils/Logger';
import { type SolutionModel, SolutionProjectRef } from '../../services/solution/SolutionModel';

/**
 * 根据命令参数确定活动项目
 *
 * 上下文菜单调用时参数为 (点击项, 所有选中项)，选中项优先于点击项；
 * 命令面板调用时没有参数，此时使用视图当前的选择。
 * 视图节点取其 project，资源管理器中的文件（带 fsPath）按路径在解决方案中查找，
 * 其余参数忽略。结果按出现顺序去重。
 */
export function resolveActiveProjects(
    solution: SolutionModel,
    args: readonly unknown[],
    viewSelection: readonly unknown[],
    logger?: Logger
): SolutionProjectRef[] {
    const [clicked, selected] = args;

    let items: readonly unknown[];
    if (Array.isArray(selected) && selected.length > 0) {
        items = selected;
    } else if (clicked !== undefined) {
        items = [clicked];
    } else {
        items = viewSelection;
    }

    const projects: SolutionProjectRef[] = [];
    for (const item of items) {
        const project = toProject(solution, item, logger);
        if (project && !projects.includes(project)) {
            projects.push(project);
        }
    }
    return projects;
}

function toProject(solution: SolutionModel, item: unknown, logger?: Logger): SolutionProjectRef | undefined {
    if (typeof item !== 'object' || item === null) {
        return undefined;
    }
    if ('project' in item && item.project instanceof SolutionProjectRef) {
        return item.project;
    }
    if ('fsPath' in item && typeof item.fsPath === 'string') {
        const project = solution.findProjectByFilePath(item.fsPath);
        if (!project) {
            logger?.warn(`文件 ${item.fsPath} 不属于当前解决方案`);
        }
        return project;
    }
    return undefined;
}
