// Ignore/filter policy: which paths in a project tree are indexable.
//
// Pure functions, no state. Paths are relative to the project root and may use
// either separator. Shared by the full-scan walker (to prune whole directories)
// and the watcher (to drop events before they are queued).

/** Dependency trees, build outputs and tool caches */
const IGNORED_DIRECTORIES = new Set([
  'node_modules', 'bower_components', 'dist', 'build', 'target', 'out',
  '__pycache__', 'venv', 'vendor', 'coverage', 'htmlcov',
]);

/** OS and editor metadata files */
const IGNORED_FILES = new Set(['.DS_Store', 'Thumbs.db', 'desktop.ini']);

const IGNORED_EXTENSIONS = ['.tmp', '.temp', '.swp', '.swo', '.log', '.pyc', '.bak'];

const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];

function segments(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter(s => s !== '' && s !== '.');
}

/** True for a directory name the walker should never descend into */
export function isIgnoredDirectoryName(name: string): boolean {
  // Hidden directories cover VCS and IDE metadata (.git, .obsidian, .idea, .vscode, .venv ...)
  return name.startsWith('.') || IGNORED_DIRECTORIES.has(name);
}

/** True for a file name that is OS metadata, an editor swap/backup or a log */
export function isIgnoredFileName(name: string): boolean {
  if (IGNORED_FILES.has(name)) return true;
  if (name.startsWith('.')) return true;
  if (name.startsWith('~$') || name.endsWith('~')) return true;
  const lower = name.toLowerCase();
  return IGNORED_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/** Whether a file at this project-relative path should be indexed */
export function shouldIndex(relativePath: string): boolean {
  const parts = segments(relativePath);
  if (parts.length === 0) return false;
  const fileName = parts[parts.length - 1];
  if (parts.slice(0, -1).some(isIgnoredDirectoryName)) return false;
  return !isIgnoredFileName(fileName);
}

/** Whether the walker should descend into a directory at this project-relative path */
export function shouldDescend(relativeDirPath: string): boolean {
  return !segments(relativeDirPath).some(isIgnoredDirectoryName);
}

/** Markdown files are parsed into graph content; other files are tracked only */
export function isMarkdownPath(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return MARKDOWN_EXTENSIONS.some(ext => lower.endsWith(ext));
}
