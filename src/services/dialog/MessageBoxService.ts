export type MessageBoxIcon = 'warning' | 'critical';

export type MessageBoxButtons = 'okCancel' | 'ok';

export type MessageBoxResult = 'ok' | 'cancel';

export interface MessageBoxOptions {
    message: string;
    icon: MessageBoxIcon;
    buttons: MessageBoxButtons;
    /** 默认聚焦的按钮，目前只有第一个按钮（OK） */
    defaultButton: 'first';
}

/**
 * 模态对话框服务
 *
 * 调用方在对话框关闭之前挂起；用户关闭对话框等同于取消。
 */
export interface MessageBoxService {
    show(options: MessageBoxOptions): Promise<MessageBoxResult>;
}
