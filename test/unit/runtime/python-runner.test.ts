import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ChildProcess, type SpawnOptions } from 'node:child_process';
import { Writable } from 'node:stream';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { BOOTSTRAP, PythonRunner, SOURCE_MAP_ENV, type SpawnFn } from '../../../src/runtime/python-runner.js';
import { Logger, LogLevel } from '../../../src/utils/logger.js';

const silent = new Logger('test', LogLevel.ERROR, () => {});

interface SpawnCall {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: SpawnOptions;
}

interface FakeSpawn {
  readonly spawn: SpawnFn;
  readonly calls: SpawnCall[];
  /** 通过文件描述符 3 收到的程序文本 */
  readonly received: string[];
}

function fakeSpawn(outcome: { exitCode: number } | { error: Error }): FakeSpawn {
  const calls: SpawnCall[] = [];
  const received: string[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    const proc = new ChildProcess();
    const channel = new Writable({
      write(chunk, _encoding, callback) {
        received.push(String(chunk));
        callback();
      },
      final(callback) {
        callback();
        setImmediate(() => {
          if ('error' in outcome) {
            proc.emit('error', outcome.error);
          } else {
            proc.emit('close', outcome.exitCode, null);
          }
        });
      },
    });
    Object.defineProperty(proc, 'stdio', { value: [null, null, null, channel] });
    return proc;
  };
  return { spawn, calls, received };
}

describe('PythonRunner', () => {
  it('构建引导脚本调用', () => {
    const runner = new PythonRunner({ command: 'python3.11', checkVersion: false, logger: silent });
    assert.deepEqual(runner.buildInvocation({ source: 'x', sourceName: 'main.ddmm', args: ['-v', 'in.txt'] }), {
      command: 'python3.11',
      args: ['-c', BOOTSTRAP, 'main.ddmm', '-v', 'in.txt'],
    });
  });

  it('通过文件描述符 3 传送程序并返回退出码', async () => {
    const fake = fakeSpawn({ exitCode: 3 });
    const runner = new PythonRunner({ command: 'py', checkVersion: false, spawn: fake.spawn, logger: silent });

    const exitCode = await runner.run({
      source: 'print ( 1 )\n',
      sourceName: '<string>',
      env: { PYTHONPATH: '/cache' },
    });

    assert.equal(exitCode, 3);
    assert.deepEqual(fake.received, ['print ( 1 )\n']);
    assert.equal(fake.calls.length, 1);
    const [call] = fake.calls;
    assert.equal(call?.command, 'py');
    assert.deepEqual(call?.args, ['-c', BOOTSTRAP, '<string>']);
    assert.deepEqual(call?.options.stdio, ['inherit', 'inherit', 'inherit', 'pipe']);
    assert.deepEqual(call?.options.env, { PYTHONPATH: '/cache' });
  });

  it('进程无法启动时报告 R001', async () => {
    const fake = fakeSpawn({ error: new Error('spawn py ENOENT') });
    const runner = new PythonRunner({ command: 'py', checkVersion: false, spawn: fake.spawn, logger: silent });

    await assert.rejects(
      runner.run({ source: '', sourceName: 'a.ddmm' }),
      (error: unknown) =>
        error instanceof DiagnosticError &&
        error.diagnostic.code === DiagnosticCode.R001_InterpreterNotFound &&
        error.message === "Cannot launch Python interpreter 'py': spawn py ENOENT"
    );
  });

  it('引导脚本以源名称编译并作为 __main__ 运行', () => {
    assert.ok(BOOTSTRAP.includes('os.fdopen(3'));
    assert.ok(BOOTSTRAP.includes('compile(_ddmm_code, _ddmm_name, "exec")'));
    assert.ok(BOOTSTRAP.includes('"__name__": "__main__"'));
  });

  it('程序出错时 traceback 从程序自己的栈帧开始', () => {
    assert.ok(BOOTSTRAP.includes('_ddmm_exc.__traceback__.tb_next'));
    assert.ok(BOOTSTRAP.includes('except SystemExit:\n    raise'));
    assert.ok(BOOTSTRAP.endsWith('    sys.exit(1)'));
  });

  it('缓存中的模块按映射的源文件路径编译', () => {
    assert.equal(SOURCE_MAP_ENV, 'DDMM_SOURCE_MAP');
    assert.ok(BOOTSTRAP.includes('os.environ.pop("DDMM_SOURCE_MAP", "")'));
    assert.ok(BOOTSTRAP.includes('compile(self.get_data(path), origins.get(path, path), "exec", dont_inherit=True)'));
  });
});
