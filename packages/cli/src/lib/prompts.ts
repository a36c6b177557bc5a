import inquirer from "inquirer";

export async function promptSiteName(existing: ReadonlySet<string>): Promise<string> {
  const { site } = await inquirer.prompt<{ site: string }>([
    {
      type: "input",
      name: "site",
      message: "Site name (config section, e.g. example.neocities.org):",
      filter: (input: string) => input.trim(),
      validate: (input: string) => {
        if (input.length === 0) return "Site name is required";
        if (/[[\]]/.test(input)) return "Site name cannot contain brackets";
        if (existing.has(input)) return `Site "${input}" is already configured`;
        return true;
      },
    },
  ]);
  return site;
}

export async function promptApiKey(): Promise<string> {
  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: "password",
      name: "apiKey",
      message: "Enter the site's API key:",
      mask: "*",
      validate: (input: string) => input.trim().length > 0 || "API key is required",
    },
  ]);
  return apiKey.trim();
}

export async function promptRootDir(defaultDir: string): Promise<string> {
  const { rootDir } = await inquirer.prompt<{ rootDir: string }>([
    {
      type: "input",
      name: "rootDir",
      message: "Local directory to sync:",
      default: defaultDir,
      validate: (input: string) => input.trim().length > 0 || "Directory is required",
    },
  ]);
  return rootDir.trim();
}

export async function promptAllowedExtensions(): Promise<string> {
  const { extensions } = await inquirer.prompt<{ extensions: string }>([
    {
      type: "input",
      name: "extensions",
      message: "Only sync these extensions (space-separated, empty for all):",
      default: "",
    },
  ]);
  return extensions.trim();
}

export async function confirmAction(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: "confirm",
      name: "confirmed",
      message,
      default: false,
    },
  ]);
  return confirmed;
}
