import {RespRuntime} from '../RespRuntime';
import {RespServer} from '../RespServer';
import {CommandError} from '../../errors';
import {ascii, utf8} from '../../util/buf';
import type {RespReply} from '../../resp/types';
import type {ParsedCmd} from '../../types';
import type {RespServerConnection} from '../connection/types';

const createConnection = () => {
  const connection = {
    oncmd: (cmd: ParsedCmd): void => {},
    send: jest.fn((reply: RespReply) => {}),
    close: jest.fn(() => {}),
  } satisfies RespServerConnection;
  return connection;
};

const run = (runtime: RespRuntime, name: string, ...args: string[]): RespReply | undefined =>
  runtime.exec([name, ...args.map((arg) => utf8`${arg}`)], createConnection());

describe('RespRuntime', () => {
  test('PING with and without a message', () => {
    const runtime = new RespRuntime();
    expect(run(runtime, 'PING')).toBe('PONG');
    expect(run(runtime, 'ping', 'hi')).toEqual(utf8`hi`);
  });

  test('SET then GET returns the stored bytes', () => {
    const runtime = new RespRuntime();
    expect(run(runtime, 'SET', 'k', 'v')).toBe('OK');
    expect(run(runtime, 'GET', 'k')).toEqual(utf8`v`);
    expect(run(runtime, 'GET', 'missing')).toBe(null);
  });

  test('INCR starts at zero and counts up', () => {
    const runtime = new RespRuntime();
    expect(run(runtime, 'INCR', 'n')).toBe(1);
    expect(run(runtime, 'INCR', 'n')).toBe(2);
    expect(run(runtime, 'GET', 'n')).toEqual(ascii`2`);
  });

  test('INCR past the safe integer range returns a bigint', () => {
    const runtime = new RespRuntime();
    run(runtime, 'SET', 'n', String(Number.MAX_SAFE_INTEGER));
    expect(run(runtime, 'INCR', 'n')).toBe(BigInt('9007199254740992'));
  });

  test('INCR rejects non-integers and overflow', () => {
    const runtime = new RespRuntime();
    run(runtime, 'SET', 'text', 'abc');
    run(runtime, 'SET', 'max', '9223372036854775807');
    expect(() => run(runtime, 'INCR', 'text')).toThrow(new CommandError('ERR value is not an integer or out of range'));
    expect(() => run(runtime, 'INCR', 'max')).toThrow(new CommandError('ERR increment or decrement would overflow'));
  });

  test('DEL counts the keys it removed', () => {
    const runtime = new RespRuntime();
    run(runtime, 'SET', 'a', '1');
    run(runtime, 'SET', 'b', '2');
    expect(run(runtime, 'DEL', 'a', 'b', 'c')).toBe(2);
    expect(run(runtime, 'GET', 'a')).toBe(null);
  });

  test('unknown command', () => {
    const runtime = new RespRuntime();
    expect(() => run(runtime, 'FOO', 'bar')).toThrow("ERR unknown command 'FOO'");
  });

  test('wrong number of arguments', () => {
    const runtime = new RespRuntime();
    expect(() => run(runtime, 'GET')).toThrow("ERR wrong number of arguments for 'get' command");
    expect(() => run(runtime, 'set', 'k')).toThrow("ERR wrong number of arguments for 'set' command");
    expect(() => run(runtime, 'DEL')).toThrow("ERR wrong number of arguments for 'del' command");
  });

  test('QUIT replies OK and closes the connection', () => {
    const runtime = new RespRuntime();
    const connection = createConnection();
    expect(runtime.exec(['QUIT'], connection)).toBe(undefined);
    expect(connection.send).toHaveBeenCalledWith('OK');
    expect(connection.close).toHaveBeenCalledTimes(1);
  });
});

describe('RespServer', () => {
  test('sends replies and turns failures into error replies', () => {
    const server = new RespServer();
    const connection = createConnection();
    server.onConnection(connection);
    connection.oncmd(['ECHO', utf8`x`]);
    connection.oncmd(['PING', utf8`a`, utf8`b`]);
    connection.oncmd(['NOPE']);
    expect(connection.send.mock.calls).toEqual([
      [utf8`x`],
      [new CommandError("ERR wrong number of arguments for 'ping' command")],
      [new CommandError("ERR unknown command 'NOPE'")],
    ]);
  });
});
