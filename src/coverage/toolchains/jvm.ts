import { runStep } from '../steps.js';
import type { PerProjectToolchain, ToolchainContext, UnitResult } from '../types.js';
import { manifestDirs, sumReports, topmostDirs, wrapperOr } from './projects.js';

const JVM_EXTENSIONS = ['.java', '.kt', '.kts'] as const;

async function measureJacoco(ctx: ToolchainContext, dir: string, command: string, args: string[], reportSuffix: string): Promise<UnitResult> {
  return await ctx.lock.run(dir, async () => {
    const run = await runStep(ctx, { command, args, cwd: dir, timeoutMs: ctx.settings.testTimeoutMs });
    if (run.status !== 'ok') return run;
    const totals = await sumReports(dir, reportSuffix, 'jacoco');
    return totals ? { status: 'ok', totals } : { status: 'failed', reason: `no JaCoCo report matching ${reportSuffix}` };
  });
}

/** Maven build rooted at the topmost `pom.xml`; modules are covered by the reactor. */
export const mavenToolchain: PerProjectToolchain = {
  id: 'maven',
  strategy: 'per-project',
  ecosystems: ['java', 'kotlin'],
  extensions: JVM_EXTENSIONS,

  async findProjects(_root, files) {
    return topmostDirs(manifestDirs(files, (name) => name === 'pom.xml'));
  },

  async runProject(ctx, dir) {
    const mvn = await wrapperOr(dir, 'mvnw', 'mvn');
    return await measureJacoco(
      ctx,
      dir,
      mvn,
      ['-B', '-q', 'org.jacoco:jacoco-maven-plugin:prepare-agent', 'test', 'org.jacoco:jacoco-maven-plugin:report'],
      'target/site/jacoco/jacoco.xml'
    );
  }
};

export const gradleToolchain: PerProjectToolchain = {
  id: 'gradle',
  strategy: 'per-project',
  ecosystems: ['java', 'kotlin'],
  extensions: JVM_EXTENSIONS,

  async findProjects(_root, files) {
    const isBuildFile = (name: string) => name === 'build.gradle' || name === 'build.gradle.kts';
    return topmostDirs(manifestDirs(files, isBuildFile));
  },

  async runProject(ctx, dir) {
    const gradle = await wrapperOr(dir, 'gradlew', 'gradle');
    return await measureJacoco(
      ctx,
      dir,
      gradle,
      ['--no-daemon', '-q', 'test', 'jacocoTestReport'],
      'build/reports/jacoco/test/jacocoTestReport.xml'
    );
  }
};
