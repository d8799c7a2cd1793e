import { Chalk } from "chalk";
import { runPacfetch } from "./cli";
import { userHome } from "./config";

process.exitCode = await runPacfetch(process.argv, {
	out: (line) => process.stdout.write(`${line}\n`),
	error: (line) => process.stderr.write(`${line}\n`),
	home: userHome(),
	chalk: new Chalk(),
});
