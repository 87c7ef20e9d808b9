import * as assert from 'assert';
import { PROJECT_TYPE_GUIDS } from '../models/solution';
import { SolutionDocument } from '../services/solution/SolutionDocument';
import { SolutionFileParser } from '../services/solution/SolutionFileParser';
import { readFixture } from './TestHelper';

const APP_GUID = '{11111111-1111-1111-1111-111111111111}';
const LIB_GUID = '{22222222-2222-2222-2222-222222222222}';
const TOOLS_GUID = '{44444444-4444-4444-4444-444444444444}';

suite('SolutionFileParser 测试', () => {
  const content = readFixture('Sample.sln');

  test('按文件顺序解析全部 Project 条目', () => {
    const entries = SolutionFileParser.parse(content);

    assert.deepStrictEqual(entries.map(entry => entry.name), ['App', 'src', 'Core.Lib', 'Tools']);
    assert.deepStrictEqual(entries[2], {
      typeGuid: PROJECT_TYPE_GUIDS.CSHARP_SDK_PROJECT,
      name: 'Core.Lib',
      relativePath: 'src\\Core.Lib\\Core.Lib.csproj',
      guid: LIB_GUID
    });
  });

  test('识别解决方案文件夹', () => {
    const entries = SolutionFileParser.parse(content);
    assert.deepStrictEqual(entries.map(entry => SolutionFileParser.isSolutionFolder(entry)), [false, true, false, false]);
  });

  test('GUID 统一转换为大写', () => {
    const entry = SolutionFileParser.parseProjectLine(
      'Project("{fae04ec0-301f-11d3-bf4b-00c04f79efbc}") = "Old", "Old\\Old.csproj", "{abcdef00-0000-0000-0000-000000000000}"'
    );
    assert.strictEqual(entry?.typeGuid, PROJECT_TYPE_GUIDS.CSHARP_PROJECT);
    assert.strictEqual(entry?.guid, '{ABCDEF00-0000-0000-0000-000000000000}');
  });

  test('非 Project 行返回 undefined', () => {
    assert.strictEqual(SolutionFileParser.parseProjectLine('EndProject'), undefined);
    assert.strictEqual(SolutionFileParser.parseProjectLine('Global'), undefined);
  });

  test('读取格式版本', () => {
    assert.strictEqual(SolutionFileParser.getFormatVersion(content), '12.00');
    assert.strictEqual(SolutionFileParser.getFormatVersion('\n\n<Project Sdk="Microsoft.NET.Sdk" />'), undefined);
  });
});

suite('SolutionDocument 测试', () => {
  let content: string;
  let document: SolutionDocument;

  setup(() => {
    content = readFixture('Sample.sln');
    document = new SolutionDocument(content);
  });

  test('未修改时原样输出（保留 CRLF）', () => {
    assert.strictEqual(document.toString(), content);
  });

  test('移除项目时删除其 Project 块、配置、嵌套关系与依赖引用', () => {
    document.removeProject(LIB_GUID);
    const text = document.toString();

    assert.strictEqual(text.includes('22222222'), false);
    assert.deepStrictEqual(document.entries.map(entry => entry.name), ['App', 'src', 'Tools']);
    // 原文 31 行加末尾空串，移除 2 行 Project 块、1 行依赖、2 行配置、1 行嵌套关系
    assert.strictEqual(text.split('\r\n').length, 32 - 6);
    assert.ok(text.endsWith('EndGlobal\r\n'));
    assert.ok(text.includes(`\t\t${APP_GUID}.Debug|Any CPU.Build.0 = Debug|Any CPU\r\n`));
  });

  test('移除项目不影响其他项目的配置行', () => {
    document.removeProject(TOOLS_GUID);
    const text = document.toString();

    assert.strictEqual(text.split('\r\n').length, 32 - 3);
    assert.ok(text.includes(`\t\t${LIB_GUID} = {33333333-3333-3333-3333-333333333333}\r\n`));
    assert.ok(text.includes(`\t\t${LIB_GUID}.Debug|Any CPU.ActiveCfg = Debug|Any CPU\r\n`));
  });

  test('GUID 比较忽略大小写', () => {
    document.removeProject(TOOLS_GUID.toLowerCase());
    assert.deepStrictEqual(document.entries.map(entry => entry.name), ['App', 'src', 'Core.Lib']);
  });

  test('移除不存在的项目时抛出异常', () => {
    assert.throws(
      () => document.removeProject('{99999999-9999-9999-9999-999999999999}'),
      /was not found in the solution file/
    );
    assert.strictEqual(document.toString(), content);
  });

  test('Project 块缺少 EndProject 时抛出异常且不修改文档', () => {
    const broken = [
      'Microsoft Visual Studio Solution File, Format Version 12.00',
      `Project("${PROJECT_TYPE_GUIDS.CSHARP_SDK_PROJECT}") = "App", "App\\App.csproj", "${APP_GUID}"`,
      `Project("${PROJECT_TYPE_GUIDS.CSHARP_SDK_PROJECT}") = "Tools", "Tools.csproj", "${TOOLS_GUID}"`,
      'EndProject',
      'Global',
      'EndGlobal',
      ''
    ].join('\n');
    const malformed = new SolutionDocument(broken);

    assert.throws(
      () => malformed.removeProject(APP_GUID),
      /^Error: Malformed solution file: project \{11111111-1111-1111-1111-111111111111\} has no matching EndProject$/
    );
    assert.strictEqual(malformed.toString(), broken);
  });

  test('最后一个 Project 块缺少 EndProject 时不会截断 Global 部分', () => {
    const broken = [
      'Microsoft Visual Studio Solution File, Format Version 12.00',
      `Project("${PROJECT_TYPE_GUIDS.CSHARP_SDK_PROJECT}") = "Tools", "Tools.csproj", "${TOOLS_GUID}"`,
      'Global',
      'EndGlobal'
    ].join('\n');
    const malformed = new SolutionDocument(broken);

    assert.throws(() => malformed.removeProject(TOOLS_GUID), /has no matching EndProject/);
    assert.strictEqual(malformed.toString(), broken);
  });

  test('LF 换行的文档保持 LF', () => {
    const lf = new SolutionDocument(content.replace(/\r\n/g, '\n'));
    lf.removeProject(TOOLS_GUID);
    assert.strictEqual(lf.toString().includes('\r\n'), false);
    assert.strictEqual(lf.toString().split('\n').length, 32 - 3);
  });
});
