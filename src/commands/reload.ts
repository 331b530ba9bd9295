import { Args, Command, Flags } from "@oclif/core";
import { Output } from "../lib/output.js";
import { runReload } from "../lib/reload-runner.js";

export default class Reload extends Command {
  static description =
    "Compare a Quagga configuration file with the running configuration and apply the difference without restarting the daemons";

  static examples = [
    "<%= config.bin %> --test /etc/quagga/Quagga.conf",
    "<%= config.bin %> --test --input saved-running.conf /etc/quagga/Quagga.conf",
    "<%= config.bin %> --reload /etc/quagga/Quagga.conf",
    "<%= config.bin %> --reload --debug --log-file /tmp/reload.log /etc/quagga/Quagga.conf",
  ];

  static args = {
    filename: Args.string({
      description: "Location of the new Quagga config file",
      required: true,
    }),
  };

  static flags = {
    reload: Flags.boolean({
      description: "Apply the deltas",
      exactlyOne: ["reload", "test"],
    }),
    test: Flags.boolean({
      description: "Show the deltas",
      exactlyOne: ["reload", "test"],
    }),
    input: Flags.string({
      description: 'Read running config from file instead of "show running"',
      exclusive: ["reload"],
    }),
    debug: Flags.boolean({
      description: "Enable debugs",
      default: false,
    }),
    config: Flags.string({
      char: "c",
      description: "YAML settings file (default: /etc/quagga/reload.yaml if present)",
    }),
    "log-file": Flags.string({
      description: "Where --reload writes its log",
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Reload);
    const out = new Output({ verbose: flags.debug });

    const code = await runReload(
      {
        mode: flags.reload ? "reload" : "test",
        filename: args.filename,
        input: flags.input,
        debug: flags.debug,
        config: flags.config,
        logFile: flags["log-file"],
      },
      out
    );
    if (code !== 0) {
      process.exit(code);
    }
  }
}
