import fs from 'fs';
import path from 'path';
import AppRoot from 'app-root-path';
import dotEnv from 'dotenv';

export function resolveEnvPath(env: NodeJS.ProcessEnv = process.env): string {
    if (env.FWXG_ENV_FILE) {
        return env.FWXG_ENV_FILE;
    }

    //allow /.env, mounted by containers
    return fs.existsSync(path.join('/.env')) ? path.join('/.env') : path.join(AppRoot.path, '.env');
}

dotEnv.config({
    path: resolveEnvPath()
});
