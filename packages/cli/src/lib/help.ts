import { IGNORE_FILE_NAME } from "@neocities-sync/shared";
import { CONFIG_FILE_DISPLAY } from "./config.js";

/** Config file and ignore file reference shown after the command help */
export const CONFIG_HELP = `
Config file (${CONFIG_FILE_DISPLAY}):
  One INI section per site, named after the site. Keys:
    api_key             API key of the site (required)
    root_dir            local directory to mirror (required)
    sync_disallowed     upload file types a free account cannot (default: no)
    sync_hidden         sync files and directories starting with "." (default: no)
    sync_vcs            sync version-control directories such as .git (default: no)
    allowed_extensions  space-separated extensions to sync (default: any)
    remove_empty_dirs   remove remote directories left empty (default: yes)

  Example:
    [example.neocities.org]
    api_key = your-api-key
    root_dir = ~/sites/example
    allowed_extensions = .html .css .png

Ignore files:
  A ${IGNORE_FILE_NAME} file in any directory lists gitignore-style patterns
  for that directory and everything below it. Later patterns override
  earlier ones, "!" re-includes, and a trailing "/" matches directories only.`;
