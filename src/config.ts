import * as vscode from 'vscode';
import * as path from 'path';
import { LogLevel, parseLogLevel } from './core/utils/Logger';

export const CONFIG_SECTION = 'deleteProject';

/**
 * 获取用户配置的解决方案文件的绝对路径。
 * 相对路径按第一个工作区文件夹解析；未配置时返回 undefined，由调用方自动查找。
 */
export function getConfiguredSolutionPath(): string | undefined {
    const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
    const solutionPath = (config.get<string>('solutionPath') ?? '').trim();

    if (!solutionPath) {
        return undefined;
    }

    if (path.isAbsolute(solutionPath)) {
        return solutionPath;
    }

    const folder = vscode.workspace.workspaceFolders?.[0];
    if (!folder) {
        void vscode.window.showWarningMessage('deleteProject.solutionPath is relative but no workspace folder is open.');
        return undefined;
    }
    return path.join(folder.uri.fsPath, solutionPath);
}

/**
 * 移除项目后是否自动保存 .sln 文件
 */
export function shouldSaveSolutionAfterRemove(): boolean {
    return vscode.workspace.getConfiguration(CONFIG_SECTION).get<boolean>('saveSolutionAfterRemove', true);
}

/**
 * 是否将项目目录移入回收站
 */
export function shouldUseTrash(): boolean {
    return vscode.workspace.getConfiguration(CONFIG_SECTION).get<boolean>('useTrash', false);
}

/**
 * 获取配置的日志级别，默认 INFO
 */
export function getConfiguredLogLevel(): LogLevel {
    const name = vscode.workspace.getConfiguration(CONFIG_SECTION).get<string>('logLevel');
    return parseLogLevel(name) ?? LogLevel.INFO;
}
