import * as vscode from 'vscode';
import type { DirectoryRemover } from './DirectoryRemover';

/**
 * 通过 VS Code 工作区文件系统删除，可选择移入回收站
 */
export class WorkspaceDirectoryRemover implements DirectoryRemover {
    constructor(private readonly useTrash: boolean) {}

    public async removeDirectory(dirPath: string): Promise<void> {
        await vscode.workspace.fs.delete(vscode.Uri.file(dirPath), {
            recursive: true,
            useTrash: this.useTrash
        });
    }
}
