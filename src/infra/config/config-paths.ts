import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(env: NodeJS.ProcessEnv): string {
  const homeFromEnv = env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

/**
 * Directory holding recollect.json and, by default, the database.
 * Created on first access.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RECOLLECT_CONFIG_DIR;
  let configDir: string;

  if (typeof override === 'string' && override.trim()) {
    configDir = override;
  } else {
    const xdgConfigHome = env.XDG_CONFIG_HOME;
    const baseDir =
      typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
        ? xdgConfigHome
        : path.join(resolveHomeDir(env), '.config');
    configDir = path.join(baseDir, 'recollect');
  }

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  return configDir;
}
