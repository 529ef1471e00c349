import { Command } from "commander";
import { AppendLogStorage, HierarchicalStorage, withStorage } from "@pipeboard/core";

export type Writer = (line: string) => void;

/**
 * Build the `pipeboard` command; output lines go to `write`
 */
export function createProgram(write: Writer = (line) => console.log(line)): Command {
    const program = new Command();

    program
        .name("pipeboard")
        .description("Inspect pipeboard cache stores");

    program
        .command("keys")
        .description("List the keys of a cache store")
        .argument("<path>", "store directory, or append log file with --log")
        .option("-l, --log", "read an append log file")
        .action((path: string, options: { log?: boolean }) => {
            const store = options.log
                ? new AppendLogStorage(path, { mode: "r" })
                : new HierarchicalStorage(path, { mode: "r" });
            withStorage(store, (opened) => {
                for (const key of opened.keys()) {
                    write(key);
                }
            });
        });

    program
        .command("show")
        .description("Print the metadata and content hashes of an entry")
        .argument("<path>", "store directory")
        .argument("<key>", "entry key")
        .action((path: string, key: string) => {
            const store = new HierarchicalStorage(path, { mode: "r", dataKey: key });
            const info = withStorage(store, (opened) => opened.inspect());
            write(JSON.stringify(info, null, 2));
        });

    return program;
}
