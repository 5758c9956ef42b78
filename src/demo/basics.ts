/**
 * @file src/demo/basics.ts
 *
 * TypeScript basics, printed one section at a time: bindings and immutability,
 * values vs. shared references, interfaces, unions with exhaustive matching,
 * and the built-in collections.
 *
 * Everything here is local; running the demo leaves no state behind.
 */

import { header, printLine } from '../cli/output.js';

interface User {
  readonly username: string;
  readonly email: string;
  signInCount: number;
  active: boolean;
}

type AccountStatus = 'active' | 'inactive' | 'locked';

export function describeStatus(status: AccountStatus): string {
  switch (status) {
    case 'active':
      return 'Account is active';
    case 'inactive':
      return 'Account is inactive';
    case 'locked':
      return 'Account is locked';
    default: {
      // Adding a member to AccountStatus without a case fails to compile here
      const unreachable: never = status;
      return unreachable;
    }
  }
}

function takeCopy(s: string): string {
  return `  Took a copy of: ${s}`;
}

function giveValue(): string {
  const s = 'returning a value';
  return s;
}

/** Builds the demo's lines. Pure. */
export function basicsDemoLines(): string[] {
  const lines: string[] = [];

  lines.push('Variables Demo:');
  const immutableVar = 5;
  let mutableVar = 10;
  lines.push(`  Immutable: ${immutableVar}, Mutable: ${mutableVar}`);
  mutableVar = 15;
  lines.push(`  Updated mutable: ${mutableVar}`);
  const frozen = Object.freeze({ network: 'devnet' });
  lines.push(`  Frozen object: ${JSON.stringify(frozen)} (isFrozen: ${Object.isFrozen(frozen)})`);

  lines.push('');
  lines.push('Values and References Demo:');
  const s1 = 'hello';
  const s2 = s1;
  lines.push(`  s1: ${s1}, s2: ${s2}`);
  lines.push(takeCopy('world'));
  lines.push(`  s4: ${giveValue()}`);
  const counter = { count: 1 };
  const alias = counter;
  alias.count += 1;
  lines.push(`  counter.count after updating alias: ${counter.count}`);

  lines.push('');
  lines.push('Interface Demo:');
  const user: User = {
    username: 'alice',
    email: 'alice@example.com',
    signInCount: 1,
    active: true,
  };
  lines.push(`  User: ${user.username}, ${user.email}`);

  lines.push('');
  lines.push('Union and Exhaustive Match Demo:');
  const status: AccountStatus = 'active';
  lines.push(`  ${describeStatus(status)}`);

  lines.push('');
  lines.push('Collection Types Demo:');
  const numbers = [1, 2, 3, 4, 5];
  numbers.push(6);
  lines.push(`  Array: [${numbers.join(', ')}]`);
  const scores = new Map<string, number>();
  scores.set('Blue', 10);
  scores.set('Red', 50);
  const entries = [...scores].map(([team, score]) => `"${team}" => ${score}`);
  lines.push(`  Map: {${entries.join(', ')}}`);

  return lines;
}

/** Prints the demo and returns what it printed. */
export function runBasicsDemo(): string[] {
  header('TypeScript Basics Demo');
  const lines = basicsDemoLines();
  for (const line of lines) printLine(line);
  return lines;
}
