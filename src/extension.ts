import * as vscode from 'vscode';
import { ExtensionInitializer } from './core/ExtensionInitializer';

// 当您的扩展被激活时,将调用此方法
export function activate(context: vscode.ExtensionContext): Promise<void> {
	const initializer = new ExtensionInitializer(context);
	return initializer.initialize();
}

// 资源都登记在 context.subscriptions 中，由宿主统一释放
export function deactivate(): void {}
