import { PROJECT_TYPE_GUIDS, type SolutionProjectEntry } from '../../models/solution';

/**
 * 匹配 Project("{类型}") = "名称", "路径", "{GUID}"
 */
const PROJECT_LINE = /^Project\("(\{[^}]+\})"\)\s*=\s*"([^"]*)"\s*,\s*"([^"]*)"\s*,\s*"(\{[^}]+\})"/i;

const SOLUTION_HEADER = /^Microsoft Visual Studio Solution File, Format Version ([\d.]+)/;

/**
 * .sln 文件解析器
 *
 * 只解析删除项目所需的部分：文件头和 Project 条目。
 */
export class SolutionFileParser {
    /**
     * 解析单行 Project 声明，非 Project 行返回 undefined
     */
    public static parseProjectLine(line: string): SolutionProjectEntry | undefined {
        const match = PROJECT_LINE.exec(line.trim());
        if (!match) {
            return undefined;
        }
        return {
            typeGuid: match[1].toUpperCase(),
            name: match[2],
            relativePath: match[3],
            guid: match[4].toUpperCase()
        };
    }

    /**
     * 解析解决方案文本中的所有 Project 条目，保持文件中的顺序
     */
    public static parse(content: string): SolutionProjectEntry[] {
        const entries: SolutionProjectEntry[] = [];
        for (const line of content.split(/\r?\n/)) {
            const entry = this.parseProjectLine(line);
            if (entry) {
                entries.push(entry);
            }
        }
        return entries;
    }

    /**
     * 读取文件头中的格式版本，不是解决方案文件时返回 undefined
     */
    public static getFormatVersion(content: string): string | undefined {
        for (const line of content.split(/\r?\n/)) {
            const trimmed = line.replace(/^\uFEFF/, '').trim();
            if (trimmed.length === 0) {
                continue;
            }
            const match = SOLUTION_HEADER.exec(trimmed);
            return match ? match[1] : undefined;
        }
        return undefined;
    }

    public static isSolutionFolder(entry: SolutionProjectEntry): boolean {
        return entry.typeGuid === PROJECT_TYPE_GUIDS.SOLUTION_FOLDER;
    }
}
