import { config } from './config';

let testNow: Date | null = null;

export function setTestNow(date: Date | null): void {
  if (config.isTest) {
    testNow = date;
  }
}

export function getNow(): Date {
  if (config.isTest && testNow) {
    return testNow;
  }
  return new Date();
}

/** Current time in whole unix seconds, the unit of every token timestamp. */
export function nowSeconds(): number {
  return Math.floor(getNow().getTime() / 1000);
}
