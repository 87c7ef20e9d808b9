import { shouldUseTrash } from '../../config';
import { type DirectoryRemover, NodeDirectoryRemover } from './DirectoryRemover';
import { WorkspaceDirectoryRemover } from './WorkspaceDirectoryRemover';

/**
 * 每次删除时读取 deleteProject.useTrash，选择对应的删除方式
 */
export class ConfiguredDirectoryRemover implements DirectoryRemover {
    private readonly permanent = new NodeDirectoryRemover();
    private readonly trash = new WorkspaceDirectoryRemover(true);

    public removeDirectory(dirPath: string): Promise<void> {
        return shouldUseTrash()
            ? this.trash.removeDirectory(dirPath)
            : this.permanent.removeDirectory(dirPath);
    }
}
