import * as path from 'path';

const TRAILING_SEPARATORS = /[\\/]+$/;
const DRIVE_ROOT = /^[A-Za-z]:$/;

/**
 * 去除路径末尾的分隔符（同时处理 / 与 \）
 */
export function trimTrailingSeparators(dirPath: string): string {
  return dirPath.replace(TRAILING_SEPARATORS, '');
}

/**
 * 获取文件所在目录：截取最后一个分隔符（/ 或 \）之前的部分，再去除末尾分隔符。
 * 以分隔符结尾的路径返回其本身（不含末尾分隔符），没有分隔符时返回空字符串。
 */
export function getDirectoryPath(filePath: string): string {
  const index = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf('\\'));
  if (index < 0) {
    return '';
  }
  return trimTrailingSeparators(filePath.slice(0, index));
}

/**
 * 是否为文件系统根目录（或无法确定的空目录），如 ""、"/"、"C:\"
 */
export function isRootDirectory(dirPath: string): boolean {
  const trimmed = trimTrailingSeparators(dirPath);
  return trimmed === '' || DRIVE_ROOT.test(trimmed);
}

/**
 * 比较两个目录是否相同（忽略大小写的序数比较，忽略末尾分隔符）
 */
export function isSameDirectory(left: string, right: string): boolean {
  return trimTrailingSeparators(left).toUpperCase() === trimTrailingSeparators(right).toUpperCase();
}

/**
 * 将 .sln 中记录的相对路径解析为当前平台的绝对路径
 */
export function resolveSolutionRelativePath(solutionDir: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return path.normalize(relativePath);
  }
  const segments = relativePath.split(/[\\/]+/).filter(segment => segment.length > 0);
  return path.resolve(solutionDir, ...segments);
}

/**
 * 规范化路径（统一分隔符、去除冗余部分），用于按路径查找项目
 */
export function normalizePath(filePath: string): string {
  return path.normalize(filePath).replace(/\\/g, '/');
}
