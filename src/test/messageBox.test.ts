import * as assert from 'assert';
import * as sinon from 'sinon';
import { type MessageWindow, VsCodeMessageBoxService } from '../services/dialog/VsCodeMessageBoxService';

type ShowMessageArgs = [string, { modal: boolean }, ...string[]];

suite('VsCodeMessageBoxService 测试', () => {
  let showWarningMessage: sinon.SinonStub<ShowMessageArgs, Promise<string | undefined>>;
  let showErrorMessage: sinon.SinonStub<ShowMessageArgs, Promise<string | undefined>>;
  let service: VsCodeMessageBoxService;

  setup(() => {
    showWarningMessage = sinon.stub<ShowMessageArgs, Promise<string | undefined>>().resolves(undefined);
    showErrorMessage = sinon.stub<ShowMessageArgs, Promise<string | undefined>>().resolves(undefined);
    const window: MessageWindow = { showWarningMessage, showErrorMessage };
    service = new VsCodeMessageBoxService(window);
  });

  teardown(() => {
    sinon.restore();
  });

  test('确认框为模态警告框并追加 OK 项', async () => {
    showWarningMessage.resolves('OK');

    const answer = await service.show({ message: 'Continue?', icon: 'warning', buttons: 'okCancel', defaultButton: 'first' });

    assert.strictEqual(answer, 'ok');
    assert.deepStrictEqual(showWarningMessage.firstCall.args, ['Continue?', { modal: true }, 'OK']);
    assert.strictEqual(showErrorMessage.callCount, 0);
  });

  test('关闭确认框视为取消', async () => {
    const answer = await service.show({ message: 'Continue?', icon: 'warning', buttons: 'okCancel', defaultButton: 'first' });
    assert.strictEqual(answer, 'cancel');
  });

  test('严重报告使用错误框且不追加按钮', async () => {
    const answer = await service.show({ message: "'Api': boom", icon: 'critical', buttons: 'ok', defaultButton: 'first' });

    assert.strictEqual(answer, 'ok');
    assert.deepStrictEqual(showErrorMessage.firstCall.args, ["'Api': boom", { modal: true }]);
    assert.strictEqual(showWarningMessage.callCount, 0);
  });
});
