/**
 * peon-ping Git Manager
 * Names the project after its work-tree root, so titles and notifications read
 * the same from any subdirectory
 */

import * as path from 'path';
import { simpleGit } from 'simple-git';
import type { SimpleGit, SimpleGitOptions } from 'simple-git';
import { debugLog } from './log.js';

const FALLBACK_PROJECT_NAME = 'project';

export class GitManager {
    private git: SimpleGit;
    private projectPath: string;
    private _isRepo: boolean | null = null;

    constructor(projectPath: string) {
        this.projectPath = projectPath;
        const options: Partial<SimpleGitOptions> = {
            baseDir: projectPath,
            binary: 'git',
            maxConcurrentProcesses: 1,
        };
        this.git = simpleGit(options);
    }

    /**
     * Check if the project path is inside a Git work tree
     */
    public async isGitRepo(): Promise<boolean> {
        if (this._isRepo !== null) {
            return this._isRepo;
        }
        try {
            this._isRepo = await this.git.checkIsRepo();
        } catch {
            this._isRepo = false;
        }
        return this._isRepo;
    }

    /**
     * Absolute path of the work-tree root, or null outside a repository
     */
    public async getRepoRoot(): Promise<string | null> {
        if (!(await this.isGitRepo())) {
            return null;
        }
        try {
            const root = await this.git.revparse(['--show-toplevel']);
            return root.trim() || null;
        } catch (error) {
            debugLog(`git rev-parse failed in ${this.projectPath}`, error);
            return null;
        }
    }
}

/**
 * Project name for `directory`: the repository root's basename, else the directory's own
 */
export async function resolveProjectName(directory: string): Promise<string> {
    let root: string | null = null;
    try {
        root = await new GitManager(directory).getRepoRoot();
    } catch (error) {
        // simple-git refuses a missing base directory
        debugLog(`Cannot inspect ${directory}`, error);
    }
    return path.basename(root ?? directory) || FALLBACK_PROJECT_NAME;
}
