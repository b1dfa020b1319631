import { mkdir, rename, rm, writeFile } from "fs/promises";
import path from "path";

/**
 * Output for one site is written into a sibling staging directory and only
 * replaces `<outputDir>/<domain>` on commit, so an aborted run leaves the
 * previous artifacts as they were.
 */
export class SiteWorkspace {
  private readonly written: string[] = [];
  private done = false;

  private constructor(
    readonly targetDir: string,
    readonly stagingDir: string
  ) {}

  static async create(outputDir: string, domain: string): Promise<SiteWorkspace> {
    const targetDir = path.resolve(outputDir, domain);
    const stagingDir = path.resolve(outputDir, `.${domain}.staging-${process.pid}-${Date.now()}`);
    await mkdir(stagingDir, { recursive: true });
    return new SiteWorkspace(targetDir, stagingDir);
  }

  get committed(): boolean {
    return this.done;
  }

  get files(): readonly string[] {
    return this.written;
  }

  async write(relativePath: string, data: string | Buffer): Promise<void> {
    const destination = path.resolve(this.stagingDir, relativePath);
    if (!destination.startsWith(this.stagingDir + path.sep)) {
      throw new Error(`Refusing to write outside the site directory: ${relativePath}`);
    }
    await mkdir(path.dirname(destination), { recursive: true });
    await writeFile(destination, data);
    this.written.push(relativePath);
  }

  async commit(): Promise<string> {
    if (this.done) return this.targetDir;
    this.done = true;
    await rm(this.targetDir, { recursive: true, force: true });
    await rename(this.stagingDir, this.targetDir);
    return this.targetDir;
  }

  async discard(): Promise<void> {
    await rm(this.stagingDir, { recursive: true, force: true });
  }
}
