import fs from "node:fs/promises";
import path from "node:path";

export interface RenderedFile {
  relPath: string;
  contents: string;
  /** Owner-only (0600) when the file carries secrets */
  secret: boolean;
}

/** Write via a temp file and rename so readers never see a partial file. */
async function writeFileAtomic(filePath: string, contents: string, mode: number) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpFile = filePath + ".tmp";
  await fs.writeFile(tmpFile, contents, { mode });
  await fs.rename(tmpFile, filePath);
  // rename keeps the temp file's mode, but an existing target may differ
  await fs.chmod(filePath, mode);
  return filePath;
}

/** uid:gid the Mastodon image runs as */
const MASTODON_UID = 1001;

export interface WrittenDeployment {
  root: string;
  written: string[];
  uploadDir: string;
  /** false when not running as root; the operator has to chown by hand */
  uploadDirOwned: boolean;
}

export async function writeDeploymentFiles(
  deployDir: string,
  files: RenderedFile[]
): Promise<WrittenDeployment> {
  const root = path.resolve(process.cwd(), deployDir);
  const written: string[] = [];
  for (const f of files) {
    written.push(await writeFileAtomic(path.join(root, f.relPath), f.contents, f.secret ? 0o600 : 0o644));
  }

  // bind-mounted upload directory for web, streaming and sidekiq
  const uploadDir = path.join(root, "public", "system");
  await fs.mkdir(uploadDir, { recursive: true, mode: 0o755 });
  let uploadDirOwned = false;
  if (process.getuid?.() === 0) {
    await fs.chown(uploadDir, MASTODON_UID, MASTODON_UID);
    uploadDirOwned = true;
  }
  return { root, written, uploadDir, uploadDirOwned };
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function copyToClipboard(text: string): Promise<boolean> {
  try {
    const { default: clipboard } = await import("clipboardy");
    await clipboard.write(text);
    return true;
  } catch {
    return false; // headless server, no clipboard provider
  }
}
