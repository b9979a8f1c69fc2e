// types/resources.ts — Raw units and assembled goods

import type { Serial } from './core.js';

export interface Foo {
  type: 'foo';
  serial: Serial;
}

export interface Bar {
  type: 'bar';
  serial: Serial;
}

export interface Foobar {
  type: 'foobar';
  foo: Foo;
  bar: Bar;
}
