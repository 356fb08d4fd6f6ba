import { FetchError, UnavailableToolError, messageOf } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import {
  parseInstalled,
  parseJson,
  parsePackageInfo,
  parseSearchOutput,
  parseSearchSections,
  parseVersionLookup
} from "../parser/inventoryParser.js";
import { CommandExecutor, CommandResult, PackageInfo, ParsedInventory, PreReleaseCandidates } from "../types.js";

export const PRE_RELEASE_SEARCH_PATTERN = "/(@|-)(beta|alpha|nightly|insider|preview|dev|next|canary|edge)/";

export interface PackageInfoResult {
  packages: PackageInfo[];
  /** Plain `brew info` text, used when the structured lookup found nothing. */
  text?: string;
}

/**
 * Reads inventory data from Homebrew. Every call invokes brew afresh; nothing
 * is cached between calls.
 */
export class InventoryClient {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly brewBin = "brew",
    private readonly logger: Logger = silentLogger
  ) {}

  async checkAvailable(): Promise<string> {
    const result = await this.runner.run(this.brewBin, ["--version"]);
    if (result.code !== 0) {
      throw new UnavailableToolError(this.brewBin, result.stderr || `exit code ${result.code}`);
    }
    return result.stdout.split("\n")[0] ?? "";
  }

  async fetchInstalled(): Promise<ParsedInventory> {
    const result = await this.brew(["info", "--json=v2", "--installed"]);
    if (result.code !== 0) {
      throw new FetchError("brew info --installed", result.stderr || `exit code ${result.code}`);
    }

    const parsed = parseInstalled(parseJson(result.stdout));
    if (!parsed) {
      throw new FetchError("brew info --installed", "output is not a package inventory");
    }

    for (const error of parsed.errors) {
      this.logger.warn(`Skipped installed entry ${error}`);
    }
    return parsed;
  }

  /** Pre-release names keyed to the search section (formula or cask) they came from. */
  async fetchPreReleaseNames(): Promise<PreReleaseCandidates> {
    try {
      const result = await this.brew(["search", PRE_RELEASE_SEARCH_PATTERN]);
      if (result.code !== 0) {
        throw new FetchError("brew search", result.stderr || `exit code ${result.code}`);
      }
      return parseSearchSections(result.stdout);
    } catch (error) {
      return this.degrade<PreReleaseCandidates>(error, new Map());
    }
  }

  async fetchMetadata(names: readonly string[]): Promise<Map<string, string>> {
    if (names.length === 0) {
      return new Map();
    }

    try {
      const result = await this.brew(["info", "--json=v2", ...names]);
      if (result.code !== 0) {
        throw new FetchError("brew info", result.stderr || `exit code ${result.code}`);
      }
      const data = parseJson(result.stdout);
      if (data === undefined) {
        throw new FetchError("brew info", "unparsable JSON");
      }
      return parseVersionLookup(data);
    } catch (error) {
      return this.degrade(error, new Map<string, string>());
    }
  }

  async fetchDescriptions(names: readonly string[]): Promise<Map<string, string>> {
    if (names.length === 0) {
      return new Map();
    }

    try {
      const result = await this.brew(["info", "--json=v2", ...names]);
      if (result.code !== 0) {
        throw new FetchError("brew info", result.stderr || `exit code ${result.code}`);
      }
      const packages = parsePackageInfo(parseJson(result.stdout));
      return new Map(packages.map((pkg) => [pkg.name, pkg.description]));
    } catch (error) {
      return this.degrade(error, new Map<string, string>());
    }
  }

  async search(query: string): Promise<string[]> {
    const term = query.trim();
    if (!term) {
      return [];
    }

    try {
      const result = await this.brew(["search", term]);
      if (result.code !== 0) {
        throw new FetchError("brew search", result.stderr || `exit code ${result.code}`);
      }
      return parseSearchOutput(result.stdout);
    } catch (error) {
      return this.degrade(error, []);
    }
  }

  async info(name: string): Promise<PackageInfoResult> {
    const structured = await this.brew(["info", "--json=v2", name]);
    if (structured.code === 0) {
      const packages = parsePackageInfo(parseJson(structured.stdout));
      if (packages.length > 0) {
        return { packages };
      }
    }

    const plain = await this.brew(["info", name]);
    if (plain.code !== 0) {
      throw new FetchError(`brew info ${name}`, plain.stderr || structured.stderr || `exit code ${plain.code}`);
    }
    return { packages: [], text: plain.stdout };
  }

  private brew(args: string[]): Promise<CommandResult> {
    this.logger.debug(`${this.brewBin} ${args.join(" ")}`);
    return this.runner.run(this.brewBin, args);
  }

  private degrade<T>(error: unknown, fallback: T): T {
    if (error instanceof UnavailableToolError) {
      throw error;
    }
    this.logger.warn(messageOf(error));
    return fallback;
  }
}
