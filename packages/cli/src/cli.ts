import { parseArgs } from "./args";
import { fieldsGet } from "./commands/fields";
import { migrate } from "./commands/migrate";
import { seed } from "./commands/seed";
import { typesDelete, typesList, typesShow } from "./commands/types";
import { use } from "./commands/use";
import { fatal, print } from "./output";

const VERSION = "0.1.0";

const HELP = `sourcedeck — manage the connection-type catalog

Usage: sourcedeck <command> [options]

Commands:
  migrate                  Create the catalog tables
  seed                     Load the reference catalog (or a JSON seed file)
  types list               List config types
  types show <key>         Show a config type and its fields
  types delete             Delete a config type and its fields
  fields get               Show one config field
  use                      Store the default database URL

Database options (all commands except use):
  --url <url>              postgres://, mysql:// or memory: URL
                           (or SOURCEDECK_DATABASE_URL env, or ~/.sourcedeck/config.json)

Migrate options:
  --reset                  Drop the catalog tables first

Seed options:
  --file <path>            JSON seed file instead of the reference catalog
  --strict                 Fail when a config type key already exists

Delete/get options:
  --id <n>                 Config type id (types delete) or field id (fields get)

General:
  --help, -h               Show this help message
  --version, -v            Show version

Environment:
  SOURCEDECK_LOG_LEVEL     debug, info, warn or error (default: info), logged to stderr

Examples:
  sourcedeck use --url postgres://localhost:5432/catalog
  sourcedeck migrate
  sourcedeck seed
  sourcedeck types show redshift
  sourcedeck types delete --id 3
  sourcedeck fields get --id 12 --url mysql://root@localhost/catalog
`;

/** Dispatch one invocation of the CLI. */
export async function main(argv: string[]): Promise<void> {
	const { command, flags, positional } = parseArgs(argv);

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return;
	}

	if (flags.help === "true" || flags.h === "true" || command.length === 0) {
		print(HELP);
		return;
	}

	const cmd = command.join(" ");

	switch (cmd) {
		case "migrate":
			await migrate(flags);
			break;

		case "seed":
			await seed(flags);
			break;

		case "types list":
			await typesList(flags);
			break;

		case "types show":
			await typesShow(flags, positional);
			break;

		case "types delete":
			await typesDelete(flags);
			break;

		case "fields get":
			await fieldsGet(flags);
			break;

		case "use":
			use(flags);
			break;

		case "help":
			print(HELP);
			break;

		case "version":
			print(VERSION);
			break;

		default:
			fatal(`Unknown command: ${cmd}\nRun 'sourcedeck --help' for usage.`);
	}
}
