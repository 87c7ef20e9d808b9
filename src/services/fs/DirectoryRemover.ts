import * as fs from 'fs/promises';

/**
 * 递归删除目录
 *
 * 目录不存在或无权限时必须抛出异常，由调用方记录失败。
 */
export interface DirectoryRemover {
    removeDirectory(dirPath: string): Promise<void>;
}

/**
 * 直接通过 Node 文件系统永久删除
 */
export class NodeDirectoryRemover implements DirectoryRemover {
    public async removeDirectory(dirPath: string): Promise<void> {
        // 不使用 force：目录不存在时应当报错
        await fs.rm(dirPath, { recursive: true });
    }
}
