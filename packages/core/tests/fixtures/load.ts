import { readFileSync } from "node:fs";

export function loadFixture<T>(name: string): T {
  const data: T = JSON.parse(readFileSync(new URL(`./${name}`, import.meta.url), "utf8"));
  return data;
}
