import { createProgram } from "./cli/program.js";

try {
    createProgram().parse(process.argv);
} catch (error) {
    if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
    } else {
        console.error("Unknown error");
    }
    process.exitCode = 1;
}
