import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import * as sinon from 'sinon';
import { SolutionModel } from '../services/solution/SolutionModel';
import { ProjectDeleter } from '../services/ProjectDeleter';
import { NodeDirectoryRemover } from '../services/fs/DirectoryRemover';
import type { MessageBoxOptions, MessageBoxResult } from '../services/dialog/MessageBoxService';
import { SAME_DIRECTORY_MESSAGE } from '../services/deletionMessages';
import { FIXTURES_DIR, createTempDir, project, silenceLogger } from './TestHelper';

suite('SolutionModel 测试', () => {
  let tempDir: string;
  let solutionPath: string;

  suiteSetup(() => {
    silenceLogger();
  });

  setup(() => {
    tempDir = createTempDir('delete-project-model-');
    solutionPath = path.join(tempDir, 'Sample.sln');
    fs.copyFileSync(path.join(FIXTURES_DIR, 'Sample.sln'), solutionPath);
  });

  teardown(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('加载后列出项目（不含解决方案文件夹）并解析绝对路径', async () => {
    const solution = await SolutionModel.load(solutionPath);

    assert.strictEqual(solution.name, 'Sample');
    assert.deepStrictEqual(solution.projects.map(p => p.name), ['App', 'Core.Lib', 'Tools']);
    assert.strictEqual(solution.projects[1].filePath, path.join(tempDir, 'src', 'Core.Lib', 'Core.Lib.csproj'));
    assert.strictEqual(solution.projects[2].filePath, path.join(tempDir, 'Tools.csproj'));
  });

  test('remove 只修改内存，save 后写回磁盘', async () => {
    const solution = await SolutionModel.load(solutionPath);
    const lib = solution.projects[1];

    solution.remove(lib);

    assert.strictEqual(solution.isDirty, true);
    assert.deepStrictEqual(solution.projects.map(p => p.name), ['App', 'Tools']);
    assert.ok(fs.readFileSync(solutionPath, 'utf8').includes('Core.Lib'), '保存前磁盘内容不变');

    assert.strictEqual(await solution.save(), true);
    assert.strictEqual(solution.isDirty, false);
    assert.strictEqual(fs.readFileSync(solutionPath, 'utf8').includes('Core.Lib'), false);
    assert.strictEqual(await solution.save(), false);
  });

  test('重复移除同一项目时抛出异常', async () => {
    const solution = await SolutionModel.load(solutionPath);
    const lib = solution.projects[1];
    solution.remove(lib);

    assert.throws(() => solution.remove(lib), /^Error: Project 'Core\.Lib' is not part of the solution$/);
  });

  test('按项目文件路径匹配普通项目引用', async () => {
    const solution = await SolutionModel.load(solutionPath);

    solution.remove(project('Tools', path.join(tempDir, 'Tools.csproj')));

    assert.deepStrictEqual(solution.projects.map(p => p.name), ['App', 'Core.Lib']);
    assert.strictEqual(solution.toString().includes('44444444'), false);
  });

  test('findProjectByFilePath 忽略大小写', async () => {
    const solution = await SolutionModel.load(solutionPath);
    const found = solution.findProjectByFilePath(path.join(tempDir, 'src', 'core.lib', 'CORE.LIB.csproj'));
    assert.strictEqual(found?.name, 'Core.Lib');
  });

  test('非解决方案文件加载失败', () => {
    assert.throws(
      () => SolutionModel.fromContent(path.join(tempDir, 'Broken.sln'), '<Project Sdk="Microsoft.NET.Sdk" />'),
      /Broken\.sln is not a Visual Studio solution file/
    );
  });
});

suite('ProjectDeleter 与 SolutionModel 集成测试', () => {
  let tempDir: string;
  let solutionPath: string;
  let show: sinon.SinonStub<[MessageBoxOptions], Promise<MessageBoxResult>>;
  let deleter: ProjectDeleter;

  setup(() => {
    tempDir = createTempDir('delete-project-run-');
    solutionPath = path.join(tempDir, 'Sample.sln');
    fs.copyFileSync(path.join(FIXTURES_DIR, 'Sample.sln'), solutionPath);

    fs.mkdirSync(path.join(tempDir, 'App'));
    fs.writeFileSync(path.join(tempDir, 'App', 'App.csproj'), '<Project Sdk="Microsoft.NET.Sdk" />');
    fs.mkdirSync(path.join(tempDir, 'src', 'Core.Lib'), { recursive: true });
    fs.writeFileSync(path.join(tempDir, 'src', 'Core.Lib', 'Core.Lib.csproj'), '<Project Sdk="Microsoft.NET.Sdk" />');
    fs.writeFileSync(path.join(tempDir, 'Tools.csproj'), '<Project Sdk="Microsoft.NET.Sdk" />');

    show = sinon.stub<[MessageBoxOptions], Promise<MessageBoxResult>>().resolves('ok');
    deleter = new ProjectDeleter({ show }, new NodeDirectoryRemover(), silenceLogger());
  });

  teardown(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('删除项目目录，同目录项目仅从解决方案移除', async () => {
    const solution = await SolutionModel.load(solutionPath);
    const [app, , tools] = solution.projects;

    const result = await deleter.confirmAndDelete([app, tools], solution);

    assert.strictEqual(fs.existsSync(path.join(tempDir, 'App')), false);
    assert.strictEqual(fs.existsSync(solutionPath), true);
    assert.strictEqual(fs.existsSync(path.join(tempDir, 'Tools.csproj')), true);
    assert.deepStrictEqual(solution.projects.map(p => p.name), ['Core.Lib']);
    assert.deepStrictEqual(result.deleted, [app]);
    assert.deepStrictEqual(show.secondCall.args[0], {
      message: `'Tools': ${SAME_DIRECTORY_MESSAGE}`,
      icon: 'warning',
      buttons: 'ok',
      defaultButton: 'first'
    });
  });

  test('目录不存在时记录严重错误，项目仍已从解决方案移除', async () => {
    fs.rmSync(path.join(tempDir, 'src', 'Core.Lib'), { recursive: true });
    const solution = await SolutionModel.load(solutionPath);
    const lib = solution.projects[1];

    const result = await deleter.confirmAndDelete([lib], solution);

    assert.deepStrictEqual(result.detached, [lib]);
    assert.strictEqual(result.critical, true);
    assert.strictEqual(show.secondCall.args[0].icon, 'critical');
    assert.ok(show.secondCall.args[0].message.startsWith("'Core.Lib': ENOENT"));
    assert.strictEqual(solution.isDirty, true);
  });
});
