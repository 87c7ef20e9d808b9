import type { MessageBoxOptions, MessageBoxResult, MessageBoxService } from './MessageBoxService';

const OK_ITEM = 'OK';

/**
 * vscode.window 中本服务用到的部分
 */
export interface MessageWindow {
    showWarningMessage(message: string, options: { modal: boolean }, ...items: string[]): PromiseLike<string | undefined>;
    showErrorMessage(message: string, options: { modal: boolean }, ...items: string[]): PromiseLike<string | undefined>;
}

/**
 * 基于 vscode.window 的模态对话框实现
 *
 * VS Code 的模态对话框总会提供“取消”按钮，因此 OK/Cancel 只需追加一个 OK 项；
 * 仅有 OK 的对话框不追加任何项，由宿主显示唯一的关闭按钮。
 * 关闭对话框（Esc 或取消）视为取消。
 */
export class VsCodeMessageBoxService implements MessageBoxService {
    constructor(private readonly window: MessageWindow) {}

    public async show(options: MessageBoxOptions): Promise<MessageBoxResult> {
        const items = options.buttons === 'okCancel' ? [OK_ITEM] : [];
        const selection = options.icon === 'critical'
            ? await this.window.showErrorMessage(options.message, { modal: true }, ...items)
            : await this.window.showWarningMessage(options.message, { modal: true }, ...items);

        if (options.buttons === 'ok') {
            return 'ok';
        }
        return selection === OK_ITEM ? 'ok' : 'cancel';
    }
}
