import { readFileSync } from 'node:fs';

const FIXTURES_DIR = new URL('../fixtures/', import.meta.url);

export function loadFixture(name: string): string {
  return readFileSync(new URL(name, FIXTURES_DIR), 'utf8');
}

export function loadJsonFixture(name: string): unknown {
  const parsed: unknown = JSON.parse(loadFixture(name));
  return parsed;
}
