import { config } from "dotenv";
import { existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

// monorepo 根目录（loadEnv 在 packages/api/src/ 下，向上 3 层）
const __dirname = dirname(fileURLToPath(import.meta.url));
const root = resolve(__dirname, "../../..");

const isProd = process.env.NODE_ENV === "production";

console.log(`[loadEnv] 当前 NODE_ENV = ${process.env.NODE_ENV}`);

// 加载顺序：.env → .env.development → .env.local（后者覆盖前者）
const envFiles = [resolve(root, ".env")];
if (!isProd) {
  for (const name of [".env.development", ".env.local"]) {
    const file = resolve(root, name);
    if (existsSync(file)) {
      envFiles.push(file);
    } else {
      console.log(`[loadEnv] 未找到 ${name}，跳过加载`);
    }
  }
}

for (let i = 0; i < envFiles.length; i++) {
  if (!existsSync(envFiles[i])) continue;
  // 后续文件需 override，否则不会覆盖 .env 中已有的变量
  config({ path: envFiles[i], override: i > 0 });
  console.log(`[loadEnv] 已加载: ${envFiles[i]}`);
}
