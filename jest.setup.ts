import 'reflect-metadata';
import { types } from 'util';

// Jest runs each test file in its own VM context, so errors created by Node's
// built-in modules (e.g. fs) fail `instanceof Error` against the sandbox's
// Error. Recognise native errors from any realm, as plain Node does.
const ownHasInstance = Function.prototype[Symbol.hasInstance];
Object.defineProperty(Error, Symbol.hasInstance, {
  value(this: Function, value: unknown): boolean {
    return ownHasInstance.call(this, value) || (this === Error && types.isNativeError(value));
  },
  configurable: true,
});
