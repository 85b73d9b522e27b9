import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { DEFAULT_DATA_DIR } from "../config/constants.js";
import { getConfigPath, saveConfig } from "../config/manager.js";
import { ensureStorageRoot } from "../store/partitions.js";
import { InvalidArgumentError } from "../utils/errors.js";

interface SetupOptions {
  config?: string;
  contact?: string;
  contactType?: string;
  dataDir?: string;
}

interface SetupAnswers {
  contact: string;
  contactType: string;
  dataDir: string;
}

async function promptMissing(opts: SetupOptions): Promise<SetupAnswers> {
  if (!stdin.isTTY) {
    throw new InvalidArgumentError(
      "Missing --contact, --contact-type or --data-dir and stdin is not a terminal to ask for them",
    );
  }

  const rl = createInterface({ input: stdin, output: stdout });
  try {
    console.log("\n--- GE Seer Setup ---");
    console.log("\nThe OSRS Wiki prices API requires a User-Agent that includes contact info.");
    console.log("This allows them to reach out if your tool causes technical issues.");

    let contactType = opts.contactType;
    if (contactType === undefined) {
      console.log("\nHow should the Wiki staff contact you if needed?");
      console.log("[1] Discord username");
      console.log("[2] Email address");
      const choice = (await rl.question("Select [1/2]: ")).trim();
      contactType = choice === "1" ? "discord" : "email";
    }

    const contact = opts.contact ?? (await rl.question(`Enter your ${contactType}: `)).trim();

    let dataDir = opts.dataDir;
    if (dataDir === undefined) {
      console.log("\nWhere should large datasets be stored?");
      console.log(`Default: ${DEFAULT_DATA_DIR}`);
      const answer = (await rl.question("Press Enter for default, or provide a new absolute path: ")).trim();
      dataDir = answer === "" ? DEFAULT_DATA_DIR : answer;
    }

    return { contact, contactType, dataDir };
  } finally {
    rl.close();
  }
}

export async function setupCommand(opts: SetupOptions): Promise<void> {
  const configPath = getConfigPath(opts.config);

  const answers: SetupAnswers =
    opts.contact !== undefined && opts.contactType !== undefined && opts.dataDir !== undefined
      ? { contact: opts.contact, contactType: opts.contactType, dataDir: opts.dataDir }
      : await promptMissing(opts);

  const config = await saveConfig(
    { contactInfo: answers.contact, contactType: answers.contactType, dataDir: answers.dataDir },
    configPath,
  );
  await ensureStorageRoot(config.data_dir);

  console.log("");
  console.log(`OSRS Wiki API User-Agent set to: ${config.user_agent}`);
  console.log(`Configuration saved to ${configPath}`);
  console.log(`Data directory set to: ${config.data_dir}`);
  console.log("\nSetup complete!");
}
