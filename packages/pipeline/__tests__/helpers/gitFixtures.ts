import { execFileSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";

export interface Author {
  name: string;
  email: string;
}

export const DEFAULT_AUTHOR: Author = { name: "Test Author", email: "author@example.com" };

export function git(repoDir: string, args: string[], date?: string, author: Author = DEFAULT_AUTHOR): string {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    GIT_AUTHOR_NAME: author.name,
    GIT_AUTHOR_EMAIL: author.email,
    GIT_COMMITTER_NAME: author.name,
    GIT_COMMITTER_EMAIL: author.email,
    GIT_CONFIG_NOSYSTEM: "1",
  };
  if (date) {
    env.GIT_AUTHOR_DATE = date;
    env.GIT_COMMITTER_DATE = date;
  }
  return execFileSync("git", ["-c", "commit.gpgsign=false", ...args], { cwd: repoDir, env, encoding: "utf8" });
}

export function initRepo(repoDir: string, branch = "main"): void {
  fs.mkdirSync(repoDir, { recursive: true });
  git(repoDir, ["init", "-q"]);
  git(repoDir, ["symbolic-ref", "HEAD", `refs/heads/${branch}`]);
}

/** Write files (relative path -> content) and commit them at a fixed date */
export function commitFiles(
  repoDir: string,
  files: Record<string, string>,
  message: string,
  date: string,
  author: Author = DEFAULT_AUTHOR,
): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(repoDir, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
  git(repoDir, ["add", "-A"]);
  git(repoDir, ["commit", "-q", "-m", message], date, author);
}

export function createBundle(repoDir: string, bundlePath: string): void {
  fs.mkdirSync(path.dirname(bundlePath), { recursive: true });
  git(repoDir, ["bundle", "create", bundlePath, "--all"]);
}

export const MIT_LICENSE = `MIT License

Copyright (c) 2020 Test Author

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
SOFTWARE.
`;

/** Ten lines, newline-terminated */
export const TEN_LINE_README = Array.from({ length: 10 }, (_, i) => `Line ${i + 1}`).join("\n") + "\n";
