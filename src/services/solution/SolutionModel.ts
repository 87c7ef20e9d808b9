import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../../core/utils/Logger';
import type { ProjectRef, SolutionRef } from '../../models/solution';
import { normalizePath, resolveSolutionRelativePath } from '../../utils/pathUtils';
import { SolutionDocument } from './SolutionDocument';
import { SolutionFileParser } from './SolutionFileParser';

/**
 * 解决方案中的项目
 */
export class SolutionProjectRef implements ProjectRef {
    constructor(
        public readonly name: string,
        public readonly filePath: string,
        public readonly guid: string
    ) {}
}

/**
 * 由 .sln 文件支撑的解决方案模型
 *
 * remove 只修改内存中的文档并标记为已修改，save 时才写回磁盘。
 */
export class SolutionModel implements SolutionRef {
    private readonly logger = Logger.getInstance();
    private projectRefs: SolutionProjectRef[];
    private dirty = false;

    private constructor(
        public readonly filePath: string,
        private readonly document: SolutionDocument
    ) {
        const solutionDir = path.dirname(filePath);
        this.projectRefs = document.entries
            .filter(entry => !SolutionFileParser.isSolutionFolder(entry))
            .map(entry => new SolutionProjectRef(
                entry.name,
                resolveSolutionRelativePath(solutionDir, entry.relativePath),
                entry.guid
            ));
    }

    /**
     * 从磁盘加载解决方案
     *
     * @throws {Error} 文件无法读取或不是解决方案文件
     */
    public static async load(filePath: string): Promise<SolutionModel> {
        const content = await fs.readFile(filePath, 'utf8');
        return SolutionModel.fromContent(filePath, content);
    }

    public static fromContent(filePath: string, content: string): SolutionModel {
        if (SolutionFileParser.getFormatVersion(content) === undefined) {
            throw new Error(`${path.basename(filePath)} is not a Visual Studio solution file`);
        }
        return new SolutionModel(path.resolve(filePath), new SolutionDocument(content));
    }

    public get name(): string {
        return path.basename(this.filePath, path.extname(this.filePath));
    }

    public get isDirty(): boolean {
        return this.dirty;
    }

    public get projects(): readonly SolutionProjectRef[] {
        return this.projectRefs;
    }

    /**
     * 按项目文件路径查找项目（忽略大小写）
     */
    public findProjectByFilePath(filePath: string): SolutionProjectRef | undefined {
        const target = normalizePath(path.resolve(filePath)).toUpperCase();
        return this.projectRefs.find(project => normalizePath(project.filePath).toUpperCase() === target);
    }

    /**
     * 从解决方案中移除项目
     *
     * @throws {Error} 项目不属于该解决方案（例如已经被移除）
     */
    public remove(project: ProjectRef): void {
        const existing = this.projectRefs.find(candidate => candidate === project)
            ?? (project instanceof SolutionProjectRef
                ? this.projectRefs.find(candidate => candidate.guid === project.guid)
                : this.findProjectByFilePath(project.filePath));

        if (!existing) {
            throw new Error(`Project '${project.name}' is not part of the solution`);
        }

        this.document.removeProject(existing.guid);
        this.projectRefs = this.projectRefs.filter(candidate => candidate !== existing);
        this.dirty = true;
        this.logger.debug(`已从解决方案 ${this.name} 中移除项目 ${existing.name}`, { guid: existing.guid });
    }

    public toString(): string {
        return this.document.toString();
    }

    /**
     * 将修改写回 .sln 文件
     *
     * @returns 是否实际写入了文件
     */
    public async save(): Promise<boolean> {
        if (!this.dirty) {
            return false;
        }
        await fs.writeFile(this.filePath, this.document.toString(), 'utf8');
        this.dirty = false;
        this.logger.info(`已保存解决方案 ${this.name}`);
        return true;
    }
}
