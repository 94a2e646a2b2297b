import { generateAll } from "./generate";

async function main() {
  generateAll();
}

main().catch((err) => {
  console.error("[icons] Fatal error:", err);
  process.exit(1);
});
