import { Logger } from '../core/utils/Logger';
import type { ProjectDeletionResult, ProjectRef, SolutionRef } from '../models/solution';
import type { ProjectDeleter } from './ProjectDeleter';

/**
 * 可写回磁盘的解决方案
 */
export interface PersistentSolution extends SolutionRef {
    save(): Promise<boolean>;
}

/**
 * 删除命令依赖的宿主能力
 */
export interface ProjectDeletionHost<TSolution extends PersistentSolution> {
    getSolution(): Promise<TSolution | undefined>;
    shouldSaveSolution(): boolean;
    notifyNoSolution(): void;
    refresh(): void;
}

/**
 * 只有确实有项目从解决方案中移除、且开启了自动保存时才保存
 */
export function shouldSaveAfterDeletion(result: ProjectDeletionResult, saveEnabled: boolean): boolean {
    return saveEnabled && result.detached.length > 0;
}

/**
 * 删除命令的执行器
 *
 * 同一时间只允许一次删除：从进入 run 起（包括等待解决方案加载的过程）
 * 到删除、保存结束为止，其间的调用都会被忽略。
 */
export class ProjectDeletionRunner<TSolution extends PersistentSolution> {
    private running = false;
    private readonly logger: Logger;

    constructor(
        private readonly deleter: ProjectDeleter,
        private readonly host: ProjectDeletionHost<TSolution>,
        logger?: Logger
    ) {
        this.logger = logger ?? Logger.getInstance();
    }

    public get isRunning(): boolean {
        return this.running;
    }

    /**
     * 执行一次删除
     *
     * @param selectProjects 解决方案加载后确定活动项目
     * @returns 删除结果；被忽略、没有解决方案或没有活动项目时返回 undefined
     */
    public async run(
        selectProjects: (solution: TSolution) => readonly ProjectRef[]
    ): Promise<ProjectDeletionResult | undefined> {
        if (this.running) {
            this.logger.warn('上一次删除尚未完成，忽略本次调用');
            return undefined;
        }

        this.running = true;
        try {
            const solution = await this.host.getSolution();
            if (!solution) {
                this.host.notifyNoSolution();
                return undefined;
            }

            const projects = selectProjects(solution);
            if (projects.length === 0) {
                this.logger.debug('没有活动项目，删除命令不执行任何操作');
                return undefined;
            }

            const result = await this.deleter.confirmAndDelete(projects, solution);
            if (result.confirmed) {
                this.logger.info('项目删除完成', {
                    deleted: result.deleted.map(project => project.name),
                    failed: result.failures.map(failure => failure.project.name)
                });
            }

            if (shouldSaveAfterDeletion(result, this.host.shouldSaveSolution())) {
                await solution.save();
            }
            return result;
        } finally {
            this.running = false;
            this.host.refresh();
        }
    }
}
