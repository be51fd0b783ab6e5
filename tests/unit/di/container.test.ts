/**
 * @fileoverview Unit tests for Container registration and resolution
 *
 * Covers single, last-wins, collection, named and map resolution, removal,
 * replacement, guard checks and dependency graphs.
 */

import {
  Container,
  FactoryError,
  Lifetime,
  NameNotExistError,
  NotExistError,
  Types,
  consoleLogger,
  token,
  typeOf,
  withName,
} from '../../../src';
import type { ILogger } from '../../../src';

// ============================================================================
// Fixtures
// ============================================================================

interface Greeter {
  name(): string;
}

function isGreeter(value: unknown): value is Greeter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'function'
  );
}

const GreeterType = token<Greeter>('Greeter', isGreeter);

class FixedGreeter implements Greeter {
  constructor(private readonly value: string) {}

  name(): string {
    return this.value;
  }
}

interface Dependency {
  id: string;
}

interface Aggregate {
  dependency: Dependency;
}

const DependencyType = token<Dependency>('Dependency');
const AggregateType = token<Aggregate>('Aggregate');

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

function createLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('Container', () => {
  let container: Container;

  beforeEach(() => {
    container = new Container();
  });

  describe('resolve()', () => {
    it('should return the registered instance', () => {
      const greeter = new FixedGreeter('test');
      container.registerInstance(GreeterType, greeter);

      expect(container.resolve(GreeterType)).toBe(greeter);
    });

    it('should return the last anonymous registration', () => {
      const first = new FixedGreeter('first');
      const second = new FixedGreeter('second');

      container
        .registerInstance(GreeterType, first)
        .registerInstance(GreeterType, second);

      expect(container.resolve(GreeterType)).toBe(second);
    });

    it('should prefer anonymous registrations over named ones', () => {
      const anonymous = new FixedGreeter('anonymous');
      const named = new FixedGreeter('named');

      container
        .registerInstance(GreeterType, anonymous)
        .registerInstance(GreeterType, named, withName('en'));

      expect(container.resolve(GreeterType)).toBe(anonymous);
    });

    it('should fall back to the most recently registered name', () => {
      const a = new FixedGreeter('a');
      const b = new FixedGreeter('b');
      const a2 = new FixedGreeter('a2');

      container
        .registerInstance(GreeterType, a, withName('a'))
        .registerInstance(GreeterType, b, withName('b'));
      expect(container.resolve(GreeterType)).toBe(b);

      container.registerInstance(GreeterType, a2, withName('a'));
      expect(container.resolve(GreeterType)).toBe(a2);
    });

    it('should fail with NotExist for an unknown type', () => {
      const error = thrownBy(() => container.resolve(GreeterType));

      expect(error).toBeInstanceOf(NotExistError);
      expect(error).toHaveProperty(
        'message',
        "item does not exist in the container: 'Greeter'",
      );
      expect(error).toHaveProperty('dependencyGraph', '');
    });

    it('should fail validation when the value does not satisfy the guard', () => {
      const Port = token<number>(
        'Port',
        (value): value is number => typeof value === 'number' && value > 0,
      );
      container.registerInstance(Port, 0);

      expect(() => container.resolve(Port)).toThrowDependencyError('Validation');
      expect(() => container.resolve(Port)).toThrow(
        "unable to cast instance to 'Port'",
      );
    });
  });

  describe('resolveAll()', () => {
    it('should return anonymous registrations in registration order', () => {
      const first = new FixedGreeter('first');
      const second = new FixedGreeter('second');

      container
        .registerInstance(GreeterType, first)
        .registerInstance(GreeterType, second);

      const all = container.resolveAll(GreeterType);
      expect(all).toHaveLength(2);
      expect(all[0]).toBe(first);
      expect(all[1]).toBe(second);
    });

    it('should list named registrations before anonymous ones', () => {
      container
        .registerInstance(GreeterType, new FixedGreeter('anon-1'))
        .registerInstance(GreeterType, new FixedGreeter('named'), withName('x'))
        .registerInstance(GreeterType, new FixedGreeter('anon-2'));

      expect(container.resolveAll(GreeterType).map((g) => g.name())).toEqual([
        'named',
        'anon-1',
        'anon-2',
      ]);
    });

    it('should fail with NotExist for an unknown type', () => {
      expect(() => container.resolveAll(GreeterType)).toThrowDependencyError(
        'NotExist',
      );
    });
  });

  describe('resolveByName()', () => {
    it('should return only the named registration', () => {
      const a = new FixedGreeter('a');
      const b = new FixedGreeter('b');

      container
        .registerInstance(GreeterType, a, withName('a'))
        .registerInstance(GreeterType, b, withName('b'));

      expect(container.resolveByName(GreeterType, 'a')).toBe(a);
      expect(container.resolveByName(GreeterType, 'b')).toBe(b);
    });

    it('should fail with NameNotExist for an unknown name', () => {
      container.registerInstance(GreeterType, new FixedGreeter('a'), withName('a'));

      const error = thrownBy(() => container.resolveByName(GreeterType, 'z'));

      expect(error).toBeInstanceOf(NameNotExistError);
      expect(error).toHaveProperty(
        'message',
        "item with the given name does not exist in the container: 'z' (type 'Greeter')",
      );
    });

    it('should fail with NotExist when the type is unknown', () => {
      expect(() =>
        container.resolveByName(GreeterType, 'a'),
      ).toThrowDependencyError('NotExist');
    });

    it('should replace a name registered twice', () => {
      const old = new FixedGreeter('old');
      const replacement = new FixedGreeter('new');

      container
        .registerInstance(GreeterType, old, withName('en'))
        .registerInstance(GreeterType, replacement, withName('en'));

      expect(container.resolveByName(GreeterType, 'en')).toBe(replacement);
      expect(container.resolveAll(GreeterType)).toEqual([replacement]);
    });
  });

  describe('resolveMap()', () => {
    it('should key named registrations by name and skip anonymous ones', () => {
      const x = new FixedGreeter('x');
      const y = new FixedGreeter('y');

      container
        .registerInstance(GreeterType, x, withName('x'))
        .registerInstance(GreeterType, new FixedGreeter('anonymous'))
        .registerInstance(GreeterType, y, withName('y'));

      const map = container.resolveMap(GreeterType);
      expect([...map.keys()]).toEqual(['x', 'y']);
      expect(map.get('x')).toBe(x);
      expect(map.get('y')).toBe(y);
    });

    it('should be empty when only anonymous registrations exist', () => {
      container.registerInstance(GreeterType, new FixedGreeter('anonymous'));

      expect(container.resolveMap(GreeterType).size).toBe(0);
    });

    it('should fail with NotExist for an unknown type', () => {
      expect(() => container.resolveMap(GreeterType)).toThrowDependencyError(
        'NotExist',
      );
    });
  });

  describe('removeAll()', () => {
    it('should make every resolution fail with NotExist', () => {
      container
        .registerInstance(GreeterType, new FixedGreeter('a'))
        .registerInstance(GreeterType, new FixedGreeter('b'), withName('b'))
        .removeAll(GreeterType);

      expect(() => container.resolve(GreeterType)).toThrowDependencyError('NotExist');
      expect(() => container.resolveAll(GreeterType)).toThrowDependencyError('NotExist');
      expect(() =>
        container.resolveByName(GreeterType, 'b'),
      ).toThrowDependencyError('NotExist');
      expect(() => container.resolveMap(GreeterType)).toThrowDependencyError('NotExist');
    });

    it('should leave other types untouched', () => {
      container
        .registerInstance(GreeterType, new FixedGreeter('a'))
        .registerInstance(Types.string, 'kept')
        .removeAll(GreeterType);

      expect(container.resolve(Types.string)).toBe('kept');
    });

    it('should be a no-op for an unknown type', () => {
      expect(container.removeAll(GreeterType)).toBe(container);
    });
  });

  describe('replaceInstance() / replaceDynamic()', () => {
    it('should leave exactly one registration', () => {
      const replacement = new FixedGreeter('replacement');

      container
        .registerInstance(GreeterType, new FixedGreeter('one'))
        .registerInstance(GreeterType, new FixedGreeter('two'))
        .registerInstance(GreeterType, new FixedGreeter('three'), withName('three'))
        .replaceInstance(GreeterType, replacement);

      expect(container.resolveAll(GreeterType)).toEqual([replacement]);
      expect(container.resolveAll(GreeterType)[0]).toBe(replacement);
      expect(container.resolve(GreeterType)).toBe(replacement);
      expect(container.has(GreeterType, 'three')).toBe(false);
    });

    it('should replace with a factory honouring its options', () => {
      let calls = 0;

      container
        .registerInstance(GreeterType, new FixedGreeter('old'))
        .replaceDynamic(
          GreeterType,
          () => new FixedGreeter(`call-${++calls}`),
          { lifetime: Lifetime.Static, name: 'dynamic' },
        );

      expect(container.resolveByName(GreeterType, 'dynamic').name()).toBe('call-1');
      expect(container.resolve(GreeterType).name()).toBe('call-1');
      expect(calls).toBe(1);
    });
  });

  describe('has()', () => {
    it('should report types and names', () => {
      container.registerInstance(GreeterType, new FixedGreeter('a'), withName('a'));

      expect(container.has(GreeterType)).toBe(true);
      expect(container.has(GreeterType, 'a')).toBe(true);
      expect(container.has(GreeterType, 'b')).toBe(false);
      expect(container.has(Types.string)).toBe(false);
    });

    it('should treat the empty name as the anonymous registration', () => {
      container.registerInstance(GreeterType, new FixedGreeter('a'), withName('a'));

      expect(container.has(GreeterType, '')).toBe(false);

      container.registerInstance(GreeterType, new FixedGreeter('b'));

      expect(container.has(GreeterType, '')).toBe(true);
    });
  });

  describe('type keys', () => {
    class Storage {
      constructor(readonly path: string) {}
    }
    const StorageToken = token<Storage>('Storage');
    const LabelToken = token<string>('string');

    it('should not resolve a token through a class of the same name', () => {
      container.registerInstance(typeOf(Storage), new Storage('/tmp'));

      expect(container.has(typeOf(Storage))).toBe(true);
      expect(container.has(StorageToken)).toBe(false);
      expect(() => container.resolve(StorageToken)).toThrow(NotExistError);
      expect(() => container.resolve(StorageToken)).toThrow(
        "item does not exist in the container: 'Storage'",
      );
    });

    it('should not resolve a primitive through a token of the same name', () => {
      container.registerInstance(LabelToken, 'label');

      expect(container.resolve(LabelToken)).toBe('label');
      expect(container.has(Types.string)).toBe(false);
      expect(() => container.resolve(Types.string)).toThrowDependencyError('NotExist');
    });

    it('should keep both registrations when a token and a class share a name', () => {
      const storage = new Storage('/var');
      container
        .registerInstance(typeOf(Storage), storage)
        .registerInstance(StorageToken, new Storage('/etc'));

      expect(container.resolve(typeOf(Storage))).toBe(storage);
      expect(container.resolve(StorageToken).path).toBe('/etc');
    });
  });

  describe('factories', () => {
    it('should pass the container to the factory', () => {
      container
        .registerInstance(DependencyType, { id: 'dep-1' })
        .registerDynamic(AggregateType, (resolver) => ({
          dependency: resolver.resolve(DependencyType),
        }));

      expect(container.resolve(AggregateType).dependency.id).toBe('dep-1');
    });

    it('should wrap a thrown error in FactoryError', () => {
      const boom = new Error('boom');
      container.registerDynamic(GreeterType, () => {
        throw boom;
      });

      const error = thrownBy(() => container.resolve(GreeterType));

      expect(error).toBeInstanceOf(FactoryError);
      expect(error).toHaveProperty('message', "factory for 'Greeter' failed: boom");
      expect(error).toHaveProperty('cause', boom);
    });

    it('should propagate container errors unchanged with the resolution path', () => {
      container.registerDynamic(AggregateType, (resolver) => ({
        dependency: resolver.resolve(DependencyType),
      }));

      const error = thrownBy(() => container.resolve(AggregateType));

      expect(error).toBeInstanceOf(NotExistError);
      expect(error).toHaveProperty('typeName', 'Dependency');
      expect(error).toHaveProperty(
        'dependencyGraph',
        '└─ Aggregate\n  └─ Dependency (UNREGISTERED)',
      );
    });

    it('should show the registration name in the path', () => {
      container.registerDynamic(
        AggregateType,
        (resolver) => ({ dependency: resolver.resolveByName(DependencyType, 'primary') }),
        withName('main'),
      );
      container.registerInstance(DependencyType, { id: 'other' }, withName('other'));

      const error = thrownBy(() => container.resolveByName(AggregateType, 'main'));

      expect(error).toBeInstanceOf(NameNotExistError);
      expect(error).toHaveProperty(
        'dependencyGraph',
        '└─ Aggregate [main]\n  └─ Dependency [primary] (UNREGISTERED NAME)',
      );
    });
  });

  describe('logging', () => {
    it('should log registrations and removals at debug level', () => {
      const logger = createLogger();
      const logged = new Container({ logger });

      logged
        .registerInstance(Types.string, 'hello')
        .registerInstance(Types.string, 'hi', withName('short'))
        .registerInstance(Types.string, 'hey', withName('short'))
        .removeAll(Types.string);

      expect(logger.debug).toHaveBeenNthCalledWith(
        1,
        "Registered instance for 'string'",
        { lifetime: Lifetime.PerRequest, name: '', replaced: false },
      );
      expect(logger.debug).toHaveBeenNthCalledWith(
        3,
        "Registered instance for 'string'",
        { lifetime: Lifetime.PerRequest, name: 'short', replaced: true },
      );
      expect(logger.debug).toHaveBeenNthCalledWith(
        4,
        "Removed 2 registration(s) of 'string'",
      );
    });

    it('should prefix console output with the level', () => {
      const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

      consoleLogger.debug('Registered instance', { name: '' });

      expect(debug).toHaveBeenCalledWith('[DEBUG] Registered instance', { name: '' });
      debug.mockRestore();
    });
  });
});
