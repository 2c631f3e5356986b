import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ChildProcess, type SpawnOptions } from 'node:child_process';
import { Writable } from 'node:stream';
import { PythonReplSession, sessionArguments } from '../../../src/repl/python-session.js';
import { INTERACTIVE_BOOTSTRAP, type SpawnFn } from '../../../src/runtime/python-runner.js';
import { Logger, LogLevel } from '../../../src/utils/logger.js';

const silent = new Logger('test', LogLevel.ERROR, () => {});

interface SpawnCall {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: SpawnOptions;
}

describe('PythonReplSession', () => {
  it('没有预载程序时只隐藏宿主提示符', () => {
    assert.deepEqual(sessionArguments(), ['-u', '-q', '-i', '-c', 'import sys; sys.ps1 = sys.ps2 = ""']);
  });

  it('预载程序经引导脚本在 __main__ 中运行', () => {
    assert.deepEqual(sessionArguments({ source: 'x = 1', sourceName: 'main.ddmm', args: ['-v'] }), [
      '-u',
      '-q',
      '-i',
      '-c',
      INTERACTIVE_BOOTSTRAP,
      'main.ddmm',
      '-v',
    ]);
    assert.ok(INTERACTIVE_BOOTSTRAP.includes('globals())'));
    assert.ok(!INTERACTIVE_BOOTSTRAP.includes('sys.exit(1)'));
  });

  it('通过文件描述符 3 发送预载程序并使用其环境变量', async () => {
    const calls: SpawnCall[] = [];
    const received: string[] = [];
    const exits: (number | null)[] = [];
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
          setImmediate(() => proc.emit('close', 0, null));
        },
      });
      Object.defineProperty(proc, 'stdio', { value: [null, null, null, channel] });
      return proc;
    };

    const session = new PythonReplSession({
      command: 'py',
      preload: { source: 'x = [ ]\n', sourceName: 's.ddmm', env: { PYTHONPATH: '/cache' } },
      onExit: code => exits.push(code),
      spawn,
      logger: silent,
    });
    await session.close();

    assert.equal(calls.length, 1);
    assert.equal(calls[0]?.command, 'py');
    assert.deepEqual(calls[0]?.options.stdio, ['pipe', 'inherit', 'inherit', 'pipe']);
    assert.deepEqual(calls[0]?.options.env, { PYTHONPATH: '/cache' });
    assert.deepEqual(received, ['x = [ ]\n']);
    assert.deepEqual(exits, [0]);
  });
});
