/**
 * my.cnf reader tests
 *
 * @description Value cleanup, INI parsing, typed getters, file loading,
 *              connection arguments and host-based section selection
 * @since 0.1.0
 */

import fs, { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { Cnf } from '../src/mycnf/cnf.js';
import { CnfSelector } from '../src/mycnf/cnfSelector.js';
import { ConfigStore, normalizeKey, readIni } from '../src/mycnf/iniReader.js';
import { cleanValue, stripComment, stripQuotes } from '../src/mycnf/valueCleaner.js';
import { ErrorCategory, WmfdbIOError, WmfdbValueError } from '../src/types.js';

const FIXTURES = path.join(__dirname, 'fixtures', 'mycnf');
const BASE = path.join(FIXTURES, 'base.cnf');
const ADD = path.join(FIXTURES, 'add.cnf');
const LABS = path.join(FIXTURES, 'labs.cnf');
const PARSE_ERROR = path.join(FIXTURES, 'parse_error.cnf');

describe('valueCleaner', () => {
  test.each([
    ['', ''],
    [' ', ' '],
    ['a', 'a'],
    ["'", "'"],
    ["''", ''],
    ["'a'", 'a'],
    ["' a'", ' a'],
    ['"', '"'],
    ['""', ''],
    ['"a"', 'a'],
    [`'"`, `'"`],
    [`'asdf"`, `'asdf"`],
    [`"'a'"`, `'a'`]
  ])('stripQuotes(%j) is %j', (input, expected) => {
    expect(stripQuotes(input)).toBe(expected);
  });

  test.each([
    ['value1#comment', 'value1'],
    ['value2  # comment', 'value2'],
    ['no comment', 'no comment'],
    ['"quoted # kept"', '"quoted # kept"'],
    ['"pa#ss" # note', '"pa#ss"'],
    ["'abc # def", "'abc"]
  ])('stripComment(%j) is %j', (input, expected) => {
    expect(stripComment(input)).toBe(expected);
  });

  test.each([
    ['"value # not a comment"', 'value # not a comment'],
    ['"pa#ss" # note', 'pa#ss'],
    ['value # real comment', 'value'],
    ["'abc # def", "'abc"],
    ['"a"b"#c', 'a"b'],
    ['"user1"', 'user1']
  ])('cleanValue(%j) is %j', (input, expected) => {
    expect(cleanValue(input)).toBe(expected);
  });

  test('valueless keys clean to an empty string', () => {
    expect(cleanValue(null)).toBe('');
    expect(cleanValue(undefined)).toBe('');
  });
});

describe('normalizeKey', () => {
  test('treats dashes and underscores alike', () => {
    const variants = ['max-allowed-packet', 'max_allowed_packet', 'max-allowed_packet'].map(normalizeKey);
    expect(variants).toEqual(['max_allowed_packet', 'max_allowed_packet', 'max_allowed_packet']);
    expect(normalizeKey(variants[0])).toBe(variants[0]);
  });
});

describe('readIni', () => {
  let store: ConfigStore;

  beforeEach(() => {
    store = new Map();
  });

  test('normalizes key spelling and keeps raw values', () => {
    readIni(store, '[client]\nmax-allowed-packet = 16M\nssl-verify-server-cert\n', 'x.cnf');
    const client = store.get('client');
    expect(client?.get('max_allowed_packet')).toBe('16M');
    expect(client?.get('ssl_verify_server_cert')).toBeNull();
  });

  test('splits on the first = only', () => {
    readIni(store, '[client]\npassword = a=b\n', 'x.cnf');
    expect(store.get('client')?.get('password')).toBe('a=b');
  });

  test('skips comments, blank lines and include directives', () => {
    readIni(store, '!includedir /etc/mysql/conf.d/\n# comment\n; other comment\n\n[client]\nuser = u\n', 'x.cnf');
    expect([...store.keys()]).toEqual(['client']);
    expect(store.get('client')?.get('user')).toBe('u');
  });

  test('accepts CRLF line endings', () => {
    readIni(store, '[client]\r\nuser = crlf\r\n', 'x.cnf');
    expect(store.get('client')?.get('user')).toBe('crlf');
  });

  test('rejects options before the first section', () => {
    expect(() => readIni(store, '\nuser = nobody\n', 'x.cnf')).toThrow(
      "File contains no section headers. file: 'x.cnf', line: 2: 'user = nobody'"
    );
  });

  test('rejects an empty key', () => {
    expect(() => readIni(store, '[client]\n= value\n', 'x.cnf')).toThrow(
      "Source contains parsing errors: 'x.cnf' [line 2]: '= value'"
    );
  });

  test('rejects a repeated section in strict mode', () => {
    expect(() => readIni(store, '[client]\nuser = a\n[client]\n', 'x.cnf')).toThrow(
      "While reading from 'x.cnf' [line 3]: section 'client' already exists"
    );
  });

  test('rejects a repeated option in strict mode, whatever its spelling', () => {
    expect(() => readIni(store, '[client]\nmax-allowed-packet = 1\nmax_allowed_packet = 2\n', 'x.cnf')).toThrow(
      "While reading from 'x.cnf' [line 3]: option 'max_allowed_packet' in section 'client' already exists"
    );
  });

  test('lets the last value win when not strict', () => {
    readIni(store, '[client]\nuser = a\n[client]\nuser = b\n', 'x.cnf', { strict: false });
    expect(store.get('client')?.get('user')).toBe('b');
  });

  test('merges repeated sections across reads', () => {
    readIni(store, '[client]\nuser = a\nport = 1\n', 'a.cnf');
    readIni(store, '[client]\nuser = b\n', 'b.cnf');
    expect(store.get('client')?.get('user')).toBe('b');
    expect(store.get('client')?.get('port')).toBe('1');
  });
});

describe('Cnf', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = mkdtempSync(path.join(tmpdir(), 'wmfdb-cnf-'));
  });

  afterEach(() => {
    rmSync(tmp, { recursive: true, force: true });
  });

  function writeCnf(name: string, text: string): string {
    const file = path.join(tmp, name);
    writeFileSync(file, text);
    return file;
  }

  describe('loading', () => {
    test('loads the base fixture', () => {
      const cnf = new Cnf();
      expect(cnf.load([BASE])).toBe(1);
      expect(cnf.sections()).toEqual(['client', 'clientextra']);
      expect(cnf.getRaw('client', 'user')).toBe('"user1"');
      expect(cnf.getRaw('client', 'port')).toBe('3999#inline comment');
      expect(cnf.getRaw('client', 'ssl-ca')).toBe('/path/to/CA.pem  # inline comment');
      expect(cnf.getRaw('client', 'missing')).toBeUndefined();
    });

    test('skips missing files and directories', () => {
      mkdirSync(path.join(tmp, 'dir.cnf'));
      const cnf = new Cnf();
      expect(cnf.load([BASE, path.join(tmp, 'missing.cnf'), path.join(tmp, 'dir.cnf'), ADD])).toBe(2);
    });

    test('findFiles keeps order and drops unreadable entries', () => {
      expect(Cnf.findFiles([ADD, path.join(tmp, 'nope.cnf'), BASE])).toEqual([ADD, BASE]);
    });

    test('reports a file that passes the filter but cannot be read', () => {
      const cause = Object.assign(new Error(`EACCES: permission denied, open '${BASE}'`), { code: 'EACCES' });
      const readSpy = jest.spyOn(fs, 'readFileSync').mockImplementation(() => {
        throw cause;
      });

      let thrown: unknown;
      try {
        new Cnf().load([BASE]);
      } catch (error) {
        thrown = error;
      }
      readSpy.mockRestore();

      expect(thrown).toBeInstanceOf(WmfdbIOError);
      expect(thrown).toMatchObject({
        message: `Unable to read ${BASE}: EACCES: permission denied, open '${BASE}'`,
        category: ErrorCategory.IO_ERROR,
        originalError: cause
      });
    });

    test('reports a parse error with file and line', () => {
      expect(() => new Cnf().load([PARSE_ERROR])).toThrow(
        `File contains no section headers. file: '${PARSE_ERROR}', line: 1: 'user = nobody'`
      );
    });

    test('strict mode can be turned off', () => {
      const file = writeCnf('dup.cnf', '[client]\nuser = a\nuser = b\n');
      expect(() => new Cnf().load([file])).toThrow(WmfdbValueError);

      const cnf = new Cnf(['client'], { strict: false });
      cnf.load([file]);
      expect(cnf.getString('user')).toBe('b');
    });
  });

  describe('typed getters', () => {
    let cnf: Cnf;

    beforeEach(() => {
      const file = writeCnf(
        'typed.cnf',
        [
          '[client]',
          'port = 3999#inline comment',
          'bad_port = 39x',
          'timeout = .5',
          'flag',
          'enabled = On',
          'weird = maybe',
          'quoted = "value # not a comment"',
          'commented = value # real comment'
        ].join('\n')
      );
      cnf = new Cnf();
      cnf.load([file]);
    });

    test('getString cleans quotes and comments', () => {
      expect(cnf.getString('quoted')).toBe('value # not a comment');
      expect(cnf.getString('commented')).toBe('value');
      expect(cnf.getString('flag')).toBe('');
      expect(cnf.getString('missing')).toBeUndefined();
    });

    test('getInt parses integers and rejects the rest', () => {
      expect(cnf.getInt('port')).toBe(3999);
      expect(cnf.getInt('missing')).toBeUndefined();
      expect(() => cnf.getInt('bad_port')).toThrow(
        'Mysql config value [client]bad_port has non-integer value: "39x"'
      );
    });

    test('getFloat parses decimals', () => {
      expect(cnf.getFloat('timeout')).toBe(0.5);
      expect(cnf.getFloat('port')).toBe(3999);
      expect(() => cnf.getFloat('bad_port')).toThrow(
        'Mysql config value [client]bad_port has non-float value: "39x"'
      );
    });

    test('getBool accepts on/off words only', () => {
      expect(cnf.getBool('enabled')).toBe(true);
      expect(() => cnf.getBool('weird')).toThrow(
        'Mysql config value [client]weird has non-boolean value: "maybe"'
      );
      expect(() => cnf.getBool('flag')).toThrow(
        'Mysql config value [client]flag has non-boolean value: ""'
      );
    });

    test('getPresence reports set keys only', () => {
      expect(cnf.getPresence('flag')).toBe(true);
      expect(cnf.getPresence('enabled')).toBe(true);
      expect(cnf.getPresence('missing')).toBeUndefined();
    });
  });

  describe('section order', () => {
    test('the first section holding a key wins', () => {
      const cnf = new Cnf(['clientextra', 'client']);
      cnf.load([BASE]);
      expect(cnf.getSectionOrder()).toEqual(['clientextra', 'client']);
      expect(cnf.getString('user')).toBe('user1_extra');
      expect(cnf.getInt('port')).toBe(3999);
    });
  });

  describe('connectionArgs', () => {
    test('reads the base fixture', () => {
      const cnf = new Cnf();
      cnf.load([BASE]);
      expect(cnf.connectionArgs()).toEqual({
        user: 'user1',
        port: 3999,
        connect_timeout: 0.3,
        max_allowed_packet: '16M',
        ssl_ca: '/path/to/CA.pem'
      });
    });

    test('later files override earlier ones', () => {
      const cnf = new Cnf();
      cnf.load([BASE, ADD]);
      expect(cnf.connectionArgs()).toEqual({
        user: 'user2',
        port: 3999,
        connect_timeout: 0.3,
        max_allowed_packet: '32M',
        ssl_ca: '/path/to/CA.pem',
        ssl_verify_cert: true,
        ssl_verify_identity: true
      });
    });

    test('overrides win and undefined overrides are ignored', () => {
      const cnf = new Cnf();
      cnf.load([BASE]);
      const args = cnf.connectionArgs({ user: 'override', port: undefined, database: 'test1' });
      expect(args.user).toBe('override');
      expect(args.port).toBe(3999);
      expect(args.database).toBe('test1');
    });

    test('an override skips reading a malformed value', () => {
      const file = writeCnf('badport.cnf', '[client]\nport = nope\n');
      const cnf = new Cnf();
      cnf.load([file]);
      expect(() => cnf.connectionArgs()).toThrow(WmfdbValueError);
      expect(cnf.connectionArgs({ port: 3310 })).toEqual({ port: 3310 });
    });

    test('uses the socket for local connections', () => {
      const cnf = new Cnf();
      cnf.load([LABS]);
      expect(cnf.connectionArgs()).toEqual({
        user: 'produser',
        password: 'test-secret',
        unix_socket: '/run/mysqld/mysqld.sock'
      });
      expect(cnf.connectionArgs({ host: 'localhost' })).toEqual({
        host: 'localhost',
        user: 'produser',
        password: 'test-secret',
        unix_socket: '/run/mysqld/mysqld.sock'
      });
    });

    test('uses the port for remote connections', () => {
      const cnf = new Cnf();
      cnf.load([LABS]);
      expect(cnf.connectionArgs({ host: 'db9999' })).toEqual({
        host: 'db9999',
        user: 'produser',
        password: 'test-secret',
        port: 3306
      });
    });

    test('maps charset and bind address', () => {
      const file = writeCnf(
        'extra.cnf',
        '[client]\ndefault-character-set = utf8mb4\nbind-address = 192.0.2.10\nssl-cert = /c.pem\nssl-key = /k.pem\n'
      );
      const cnf = new Cnf();
      cnf.load([file]);
      expect(cnf.connectionArgs()).toEqual({
        charset: 'utf8mb4',
        bind_address: '192.0.2.10',
        ssl_cert: '/c.pem',
        ssl_key: '/k.pem'
      });
    });
  });
});

describe('CnfSelector', () => {
  let selector: CnfSelector;

  beforeEach(() => {
    selector = new CnfSelector();
    expect(selector.load([LABS, path.join(FIXTURES, 'missing.cnf')])).toBe(1);
  });

  test.each<[string, string[]]>([
    ['clouddb1001', ['clientlabsdb', 'client']],
    ['clouddb1001.eqiad.wmnet', ['clientlabsdb', 'client']],
    ['db1001', ['client']],
    ['xclouddb1001', ['client']],
    ['clouddb', ['client']]
  ])('host %s reads sections %j', (host, order) => {
    expect(selector.select(host).getSectionOrder()).toEqual(order);
  });

  test('cloud hosts get the labs credentials', () => {
    expect(selector.connectionArgs('clouddb1001')).toEqual({
      host: 'clouddb1001',
      user: 'labsuser',
      password: 'test-secret',
      port: 3306
    });
  });

  test('other hosts get the default credentials', () => {
    expect(selector.connectionArgs('db1001', { port: 3311 })).toEqual({
      host: 'db1001',
      user: 'produser',
      password: 'test-secret',
      port: 3311
    });
  });

  test('the first matching rule wins', () => {
    const ordered = new CnfSelector(
      ['client'],
      [
        { pattern: /db1\d+/, sectionOrder: ['clientextra', 'client'] },
        { pattern: /db\d+/, sectionOrder: ['client', 'clientextra'] }
      ]
    );
    ordered.load([BASE]);

    expect(ordered.select('db1001').getSectionOrder()).toEqual(['clientextra', 'client']);
    expect(ordered.select('db1001').getString('user')).toBe('user1_extra');
    expect(ordered.select('db2001').getSectionOrder()).toEqual(['client', 'clientextra']);
    expect(ordered.select('db2001').getString('user')).toBe('user1');
    expect(ordered.select('es1001').getSectionOrder()).toEqual(['client']);
  });

  test('custom rules match the whole host', () => {
    const custom = new CnfSelector(['client'], [{ pattern: /db1\d+/g, sectionOrder: ['clientextra', 'client'] }]);
    custom.load([BASE]);
    expect(custom.select('db1001').getString('user')).toBe('user1_extra');
    expect(custom.select('db1001').getString('user')).toBe('user1_extra');
    expect(custom.select('db1001.eqiad.wmnet').getString('user')).toBe('user1');
  });
});
