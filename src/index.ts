import { Command } from "commander";
import { buildCommand } from "./commands/build.js";
import { statusCommand } from "./commands/status.js";
import { doctorCommand } from "./commands/doctor.js";
import { cleanCommand } from "./commands/clean.js";
import { recipeCommand } from "./commands/recipe.js";

const program = new Command();

program
  .name("metabuild")
  .description("Build and install the XLibre X server and its drivers into a local pacman repository.")
  .version("0.1.0");

program.addCommand(buildCommand, { isDefault: true });
program.addCommand(statusCommand);
program.addCommand(doctorCommand);
program.addCommand(cleanCommand);
program.addCommand(recipeCommand);

await program.parseAsync();
