export { count } from "./count";
