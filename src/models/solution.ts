/**
 * 解决方案中的项目引用
 *
 * 宿主层负责提供具体实现；删除逻辑只依赖名称和项目文件路径。
 */
export interface ProjectRef {
    /** 显示名称 */
    readonly name: string;
    /** 项目文件（.csproj 等）的绝对路径 */
    readonly filePath: string;
}

/**
 * 解决方案引用
 */
export interface SolutionRef {
    /** .sln 文件的绝对路径 */
    readonly filePath: string;
    /**
     * 从内存中的解决方案模型里移除项目，不触及磁盘上的项目目录
     */
    remove(project: ProjectRef): void | Promise<void>;
}

/**
 * .sln 文件中的一个 Project 条目
 */
export interface SolutionProjectEntry {
    typeGuid: string;
    name: string;
    /** 相对于解决方案目录的路径，保持文件中的写法（通常使用反斜杠） */
    relativePath: string;
    guid: string;
}

/**
 * 常见的项目类型 GUID
 */
export const PROJECT_TYPE_GUIDS = {
    SOLUTION_FOLDER: '{2150E333-8FDC-42A3-9474-1A3956D46DE8}',
    CSHARP_PROJECT: '{FAE04EC0-301F-11D3-BF4B-00C04F79EFBC}',
    CSHARP_SDK_PROJECT: '{9A19103F-16F7-4668-BE54-9A1E7A4F7556}',
    VB_PROJECT: '{F184B08F-C81C-45F6-A57F-5ABD9991F28F}',
    FSHARP_PROJECT: '{F2A71F9B-5D33-465A-A702-920D77279786}'
} as const;

/**
 * 单个项目删除失败的记录
 */
export interface ProjectDeletionFailure {
    project: ProjectRef;
    message: string;
    /** false 表示同目录保护主动拒绝删除，而非运行时异常 */
    isException: boolean;
}

/**
 * 一次删除命令的执行结果
 */
export interface ProjectDeletionResult {
    /** 用户是否确认了删除 */
    confirmed: boolean;
    /** 已从解决方案中移除的项目（不论目录是否删除成功） */
    detached: ProjectRef[];
    /** 已从磁盘删除目录的项目 */
    deleted: ProjectRef[];
    failures: ProjectDeletionFailure[];
    /** 是否存在真正的异常，决定结果对话框的图标 */
    critical: boolean;
}
