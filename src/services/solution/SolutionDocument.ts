import type { SolutionProjectEntry } from '../../models/solution';
import { SolutionFileParser } from './SolutionFileParser';

type SectionKind = 'configuration' | 'nested' | 'dependencies' | 'other';

const NESTED_LINE = /^(\{[^}]+\})\s*=\s*(\{[^}]+\})$/;

/**
 * 内存中的 .sln 文档
 *
 * 以行为单位保存原文，移除项目时只删除与该项目相关的行，
 * 其余内容（包括换行符风格）保持不变。
 */
export class SolutionDocument {
    private lines: string[];
    private readonly eol: string;

    constructor(content: string) {
        this.eol = content.includes('\r\n') ? '\r\n' : '\n';
        this.lines = content.split(/\r?\n/);
    }

    /**
     * 文档中的全部 Project 条目（包括解决方案文件夹）
     */
    public get entries(): SolutionProjectEntry[] {
        return SolutionFileParser.parse(this.toString());
    }

    /**
     * 移除项目：Project 块、配置平台行、嵌套关系行以及其他项目对它的依赖
     *
     * @throws {Error} 文档中不存在该 GUID，或该 Project 块没有对应的 EndProject
     */
    public removeProject(guid: string): void {
        const target = guid.toUpperCase();
        const start = this.findProjectStart(target);
        if (start < 0) {
            throw new Error(`Project ${guid} was not found in the solution file`);
        }

        const end = this.findProjectEnd(start);
        if (end < 0) {
            throw new Error(`Malformed solution file: project ${guid} has no matching EndProject`);
        }
        this.lines.splice(start, end - start + 1);

        let section: SectionKind | undefined;
        this.lines = this.lines.filter(line => {
            const trimmed = line.trim();

            if (trimmed.startsWith('GlobalSection(') || trimmed.startsWith('ProjectSection(')) {
                section = getSectionKind(trimmed);
                return true;
            }
            if (trimmed === 'EndGlobalSection' || trimmed === 'EndProjectSection') {
                section = undefined;
                return true;
            }

            switch (section) {
                case 'configuration':
                    return !trimmed.toUpperCase().startsWith(`${target}.`);
                case 'nested': {
                    const match = NESTED_LINE.exec(trimmed);
                    return !match || (match[1].toUpperCase() !== target && match[2].toUpperCase() !== target);
                }
                case 'dependencies':
                    return !trimmed.toUpperCase().includes(target);
                default:
                    return true;
            }
        });
    }

    public toString(): string {
        return this.lines.join(this.eol);
    }

    /**
     * 查找 Project 块的 EndProject 行；在其之前遇到下一个 Project 或 Global 时返回 -1
     */
    private findProjectEnd(start: number): number {
        for (let index = start + 1; index < this.lines.length; index++) {
            const trimmed = this.lines[index].trim();
            if (trimmed === 'EndProject') {
                return index;
            }
            if (trimmed === 'Global' || SolutionFileParser.parseProjectLine(this.lines[index])) {
                return -1;
            }
        }
        return -1;
    }

    private findProjectStart(guid: string): number {
        const target = guid.toUpperCase();
        return this.lines.findIndex(line => SolutionFileParser.parseProjectLine(line)?.guid === target);
    }
}

function getSectionKind(header: string): SectionKind {
    if (header.startsWith('GlobalSection(ProjectConfigurationPlatforms)')) {
        return 'configuration';
    }
    if (header.startsWith('GlobalSection(NestedProjects)')) {
        return 'nested';
    }
    if (header.startsWith('ProjectSection(ProjectDependencies)')) {
        return 'dependencies';
    }
    return 'other';
}
