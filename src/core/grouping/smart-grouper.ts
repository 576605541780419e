import {
  CHANGE_TYPE_PRIORITY,
  DEFAULT_GROUPING_OPTIONS,
  GROUP_CONFIDENCE,
  ROOT_MODULE,
} from '../../constants/grouping.js';
import { GroupingOptionsSchema } from '../../schemas/validation.js';
import type { ChangedFile } from '../../types/common.js';
import {
  ChangeType,
  type DependencyMap,
  type FileGroup,
  type FileRelationship,
  type FileSource,
  type GroupingOptions,
} from '../../types/grouping.js';
import { getPathParts } from '../../utils/path-utils.js';
import { classifyChange } from './classifier.js';
import { DependencyExtractor } from './dependencies.js';
import { LocalFileSource } from './file-source.js';
import { detectRelationships, identifyTestAndImplementation } from './relationships.js';

interface GroupingRun {
  lookup: Map<string, ChangedFile>;
  relationships: FileRelationship[];
  dependencies: DependencyMap;
  assigned: Set<string>;
}

type PendingGroup = Omit<FileGroup, 'dependencies'>;

export class SmartGrouper {
  private readonly options: GroupingOptions;

  constructor(
    private readonly source: FileSource = new LocalFileSource(),
    options: Partial<GroupingOptions> = {}
  ) {
    this.options = GroupingOptionsSchema.parse({ ...DEFAULT_GROUPING_OPTIONS, ...options });
  }

  /**
   * Partitions the changed files into commit-sized groups. Every input file
   * ends up in exactly one group.
   */
  buildGroups = (files: readonly ChangedFile[]): FileGroup[] => {
    if (files.length === 0) {
      return [];
    }

    const buckets = this.groupByChangeType(files);
    const run: GroupingRun = {
      lookup: new Map(files.map((file) => [file.path, file])),
      relationships: detectRelationships(files),
      dependencies: new DependencyExtractor(this.source).extract(files),
      assigned: new Set(),
    };

    const refined = this.refineGroups(buckets, run);
    const split = this.splitLargeGroups(refined);

    return split.map((group) => this.attachDependencies(group, run.dependencies));
  };

  private readonly groupByChangeType = (
    files: readonly ChangedFile[]
  ): Map<ChangeType, ChangedFile[]> => {
    const buckets = new Map<ChangeType, ChangedFile[]>();

    for (const file of files) {
      const changeType = classifyChange(file.path);
      const bucket = buckets.get(changeType);
      if (bucket) {
        bucket.push(file);
      } else {
        buckets.set(changeType, [file]);
      }
    }

    return buckets;
  };

  private readonly refineGroups = (
    buckets: Map<ChangeType, ChangedFile[]>,
    run: GroupingRun
  ): PendingGroup[] => {
    const discovered = [...buckets.keys()];
    // Array.prototype.sort is stable, so equal priorities keep discovery order
    const ordered = [...discovered].sort(
      (a, b) => CHANGE_TYPE_PRIORITY[a] - CHANGE_TYPE_PRIORITY[b]
    );

    const groups: PendingGroup[] = [];

    for (const changeType of ordered) {
      const available = (buckets.get(changeType) ?? []).filter(
        (file) => !run.assigned.has(file.path)
      );
      if (available.length === 0) {
        continue;
      }

      if (changeType === ChangeType.TEST) {
        groups.push(...this.groupTestsWithImplementations(available, run));
      } else if (available.length <= this.options.smallGroupThreshold) {
        available.forEach((file) => run.assigned.add(file.path));
        groups.push({
          files: available,
          changeType,
          reason: `All ${changeType} changes`,
          confidence: GROUP_CONFIDENCE.SMALL_GROUP,
        });
      } else {
        const moduleGroups = this.splitByModule(available, changeType);
        moduleGroups.forEach((group) => group.files.forEach((file) => run.assigned.add(file.path)));
        groups.push(...moduleGroups);
      }
    }

    return groups;
  };

  private readonly groupTestsWithImplementations = (
    testFiles: ChangedFile[],
    run: GroupingRun
  ): PendingGroup[] => {
    const groups: PendingGroup[] = [];
    const testPaths = new Set(testFiles.map((file) => file.path));
    const implementationToTests = new Map<string, Set<string>>();

    for (const rel of run.relationships) {
      if (rel.relationshipType !== 'test-implementation') {
        continue;
      }

      const pair = identifyTestAndImplementation(rel.fileA, rel.fileB);
      if (!pair) {
        continue;
      }

      const [testPath, implPath] = pair;
      if (!testPaths.has(testPath) || !run.lookup.has(implPath)) {
        continue;
      }

      const tests = implementationToTests.get(implPath) ?? new Set<string>();
      tests.add(testPath);
      implementationToTests.set(implPath, tests);
    }

    for (const [implPath, tests] of implementationToTests) {
      if (run.assigned.has(implPath)) {
        continue;
      }

      const candidateTests = [...tests].sort().filter((test) => !run.assigned.has(test));
      if (candidateTests.length === 0) {
        continue;
      }

      const groupPaths = [implPath, ...candidateTests].sort();
      groupPaths.forEach((groupPath) => run.assigned.add(groupPath));

      const single = candidateTests.length === 1;
      groups.push({
        files: this.resolveFiles(groupPaths, run),
        changeType: ChangeType.TEST,
        reason: single ? 'Test with linked implementation' : 'Test suite with implementation',
        confidence: single ? GROUP_CONFIDENCE.SINGLE_LINKED_TEST : GROUP_CONFIDENCE.TEST_SUITE,
      });
    }

    for (const testFile of testFiles) {
      if (run.assigned.has(testFile.path)) {
        continue;
      }

      const relatedPaths = new Set([testFile.path]);
      for (const dependency of run.dependencies.get(testFile.path) ?? []) {
        if (!run.assigned.has(dependency) && run.lookup.has(dependency)) {
          relatedPaths.add(dependency);
        }
      }

      const groupPaths = [...relatedPaths].sort();
      groupPaths.forEach((groupPath) => run.assigned.add(groupPath));

      const alone = groupPaths.length === 1;
      groups.push({
        files: this.resolveFiles(groupPaths, run),
        changeType: ChangeType.TEST,
        reason: alone ? 'Isolated test change' : 'Test with supporting files',
        confidence: alone ? GROUP_CONFIDENCE.ISOLATED_TEST : GROUP_CONFIDENCE.TEST_WITH_SUPPORT,
      });
    }

    return groups;
  };

  private readonly resolveFiles = (paths: string[], run: GroupingRun): ChangedFile[] =>
    paths.flatMap((filePath) => {
      const file = run.lookup.get(filePath);
      return file ? [file] : [];
    });

  private readonly splitByModule = (
    files: ChangedFile[],
    changeType: ChangeType
  ): PendingGroup[] => {
    const modules = new Map<string, ChangedFile[]>();

    for (const file of files) {
      const parts = getPathParts(file.path);
      const moduleName = parts.length > 1 ? parts[0] : ROOT_MODULE;
      modules.set(moduleName, [...(modules.get(moduleName) ?? []), file]);
    }

    return [...modules].map(([moduleName, moduleFiles]) => ({
      files: moduleFiles,
      changeType,
      reason: `${changeType} changes in ${moduleName} module`,
      confidence: GROUP_CONFIDENCE.MODULE_GROUP,
    }));
  };

  private readonly splitLargeGroups = (groups: PendingGroup[]): PendingGroup[] => {
    const { maxGroupSize } = this.options;

    return groups.flatMap((group) => {
      if (group.files.length <= maxGroupSize) {
        return [group];
      }

      const chunks: PendingGroup[] = [];
      for (let start = 0; start < group.files.length; start += maxGroupSize) {
        chunks.push({
          files: group.files.slice(start, start + maxGroupSize),
          changeType: group.changeType,
          reason: `${group.reason} (part ${start / maxGroupSize + 1})`,
          confidence: group.confidence * GROUP_CONFIDENCE.SPLIT_FACTOR,
        });
      }
      return chunks;
    });
  };

  private readonly attachDependencies = (
    group: PendingGroup,
    dependencies: DependencyMap
  ): FileGroup => {
    const members = new Set(group.files.map((file) => file.path));
    const external = new Set(
      group.files
        .flatMap((file) => dependencies.get(file.path) ?? [])
        .filter((dependency) => !members.has(dependency))
    );

    return { ...group, dependencies: [...external].sort() };
  };
}

export const describeGroup = (group: FileGroup): string =>
  [
    `Group: ${group.changeType}`,
    `Reason: ${group.reason}`,
    `Confidence: ${(group.confidence * 100).toFixed(1)}%`,
    `Files: ${group.files.map((file) => file.path).join(', ')}`,
    `Dependencies: ${group.dependencies.length > 0 ? group.dependencies.join(', ') : 'None'}`,
  ].join('\n');
