export { printFailure, printReport, printUsage } from "./printer.js";
