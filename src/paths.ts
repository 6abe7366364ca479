import { homedir } from "node:os";
import { join } from "node:path";

export const DOCKGATE_HOME = process.env.DOCKGATE_HOME || join(homedir(), ".dockgate");
export const CONFIG_FILE = join(DOCKGATE_HOME, "config.json");
