import { collectBoundaryViolations, TEST_SUPPORT_PACKAGE } from './lib/testBoundaries';

async function main() {
  const violations = await collectBoundaryViolations(process.cwd());
  if (violations.length === 0) {
    console.log(`✅ No imports from ${TEST_SUPPORT_PACKAGE} in production code.`);
    return;
  }

  console.error(`🚫 Found forbidden imports of ${TEST_SUPPORT_PACKAGE}:`);
  for (const violation of violations) {
    console.error(` - ${violation.file}:${violation.line} :: ${violation.snippet}`);
  }
  process.exitCode = 1;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
