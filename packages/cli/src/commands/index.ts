export { configureInjectCommand } from "./inject/index.js";
