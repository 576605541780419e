import { ChangeType, type GroupingOptions, type ImportLanguage } from '../types/grouping.js';

export const MAX_FILE_SIZE_FOR_ANALYSIS = 200_000; // bytes

export const DEFAULT_GROUPING_OPTIONS: GroupingOptions = {
  maxGroupSize: 5,
  smallGroupThreshold: 3,
};

// Evaluated top to bottom, first match wins. Patterns containing "/" are
// tested against the full path, all others against the file name only.
export const CHANGE_TYPE_PATTERNS: ReadonlyArray<readonly [ChangeType, readonly string[]]> = [
  [
    ChangeType.TEST,
    [
      'tests?/',
      'test_.*\\.py$',
      '.*_test\\.py$',
      '.*\\.test\\.[jt]sx?$',
      '.*\\.spec\\.[jt]sx?$',
      '__tests__/',
    ],
  ],
  [
    ChangeType.DOCS,
    [
      '\\.md$',
      '\\.rst$',
      'docs?/',
      'README',
      'CHANGELOG',
      'LICENSE',
      '(?<!requirements)\\.txt$',
    ],
  ],
  [
    ChangeType.BUILD,
    [
      'package\\.json$',
      'package-lock\\.json$',
      'requirements\\.txt$',
      'pyproject\\.toml$',
      'setup\\.py$',
      'Makefile$',
      'CMakeLists\\.txt$',
      '\\.gradle$',
      'pom\\.xml$',
    ],
  ],
  [
    ChangeType.CONFIG,
    [
      '\\.yaml$',
      '\\.yml$',
      '\\.toml$',
      '\\.ini$',
      '\\.cfg$',
      '\\.conf$',
      '\\.env',
      'Dockerfile',
      'docker-compose',
      '\\.gitignore$',
      // Must stay last so package.json is claimed by BUILD first
      '\\.json$',
    ],
  ],
  [ChangeType.STYLE, ['\\.css$', '\\.scss$', '\\.sass$', '\\.less$', '\\.styl$']],
];

export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.py',
  '.js',
  '.jsx',
  '.ts',
  '.tsx',
  '.java',
  '.go',
  '.cpp',
  '.c',
  '.h',
  '.hpp',
  '.rs',
  '.rb',
  '.php',
  '.swift',
  '.kt',
  '.scala',
  '.cs',
  '.vb',
  '.f90',
]);

export const CHANGE_TYPE_PRIORITY: Readonly<Record<ChangeType, number>> = {
  [ChangeType.TEST]: 0,
  [ChangeType.FEATURE]: 1,
  [ChangeType.FIX]: 1,
  [ChangeType.PERF]: 1,
  [ChangeType.REFACTOR]: 2,
  [ChangeType.DOCS]: 3,
  [ChangeType.STYLE]: 3,
  [ChangeType.BUILD]: 4,
  [ChangeType.CONFIG]: 4,
  [ChangeType.CHORE]: 5,
};

export const COMPONENT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.tsx',
  '.jsx',
  '.ts',
  '.js',
  '.css',
  '.scss',
  '.sass',
  '.less',
  '.module.css',
]);

export const TEST_MARKER_PATTERN = /(test_|_test|\.test|\.spec)/g;
export const NAME_SEPARATOR_PATTERN = /[_\-.]/;
export const SIMILAR_NAMING_THRESHOLD = 0.3;

export const RELATIONSHIP_STRENGTH = {
  TEST_IMPLEMENTATION: 1.0,
  COMPONENT_PAIR: 0.9,
  SAME_DIRECTORY: 0.7,
  SIMILAR_NAMING: 0.6,
  DIRECTORY_HIERARCHY: 0.5,
} as const;

export const LANGUAGE_BY_EXTENSION: Readonly<Record<string, ImportLanguage>> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.go': 'go',
};

const ES_MODULE_IMPORTS = [
  /import\s+.*\s+from\s+['"]([^'"]+)['"]/g,
  /require\(['"]([^'"]+)['"]\)/g,
  /from\s+['"]([^'"]+)['"]/g,
];

export const IMPORT_PATTERNS: Readonly<Record<ImportLanguage, readonly RegExp[]>> = {
  python: [/from\s+([.\w]+)\s+import/g, /import\s+([.\w]+)/g, /from\s+\.+(\w+)/g],
  javascript: ES_MODULE_IMPORTS,
  typescript: ES_MODULE_IMPORTS,
  java: [/import\s+([\w.]+);/g],
  go: [/import\s+"([^"]+)"/g, /import\s+\([^)]+\)/g],
};

export const GROUP_CONFIDENCE = {
  SINGLE_LINKED_TEST: 0.9,
  TEST_SUITE: 0.95,
  ISOLATED_TEST: 0.7,
  TEST_WITH_SUPPORT: 0.78,
  SMALL_GROUP: 0.8,
  MODULE_GROUP: 0.7,
  SPLIT_FACTOR: 0.9,
} as const;

export const ROOT_MODULE = 'root';
