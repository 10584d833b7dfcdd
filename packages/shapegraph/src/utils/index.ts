export { generateId } from "./id";
export { err, ok, type Result } from "./result";
