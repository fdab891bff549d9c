export { sleep, sleepSync } from "./sleep";
export { settleWithConcurrency } from "./concurrency";
