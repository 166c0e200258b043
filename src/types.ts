/**
 * Catalog Prerequisite Type Definitions
 */

// ============ Requirement Tree ============

export type TextConditionCategory =
  | 'standing'
  | 'approval'
  | 'exemption'
  | 'preparation'
  | 'other';

export interface CourseNode {
  readonly type: 'course';
  readonly course_code: string;   // "CSCE1001"
  readonly is_concurrent: boolean; // "(or concurrent)" modifier
  readonly is_optional: boolean;   // always false for now
}

export interface AndNode {
  readonly type: 'and';
  readonly children: readonly RequirementNode[];
}

export interface OrNode {
  readonly type: 'or';
  readonly children: readonly RequirementNode[];
}

export interface GroupNode {
  readonly type: 'group';
  readonly expression: RequirementNode;
}

export interface ConcurrentNode {
  readonly type: 'concurrent';
  readonly course: RequirementNode;
  readonly note: string;
}

export interface TextConditionNode {
  readonly type: 'text_condition';
  readonly condition: string;
  readonly category: TextConditionCategory;
}

export type RequirementNode =
  | CourseNode
  | AndNode
  | OrNode
  | GroupNode
  | ConcurrentNode
  | TextConditionNode;

export interface PrerequisiteAst {
  readonly prerequisites: RequirementNode | null;
  readonly corequisites: RequirementNode | null;
  readonly raw_text: string;
  readonly parse_error?: string;
}

// ============ Catalog Records ============

/** One course as produced by the catalog extractor. Extra fields pass through. */
export interface CatalogRecord {
  title: string;
  prerequisites: string;
  concurrent: string;
  [field: string]: unknown;
}

export interface ParsedCourseRecord extends CatalogRecord {
  prerequisite_ast: PrerequisiteAst;
}

export interface LinkedCourseRecord extends ParsedCourseRecord {
  is_prerequisite_for: string[];
  is_corequisite_for: string[];
}

export interface CourseMetadata {
  course_code: string;    // "APLN 5331" (display form, keeps the space)
  course_title: string;   // "Sociolinguistics"
  difficulty_level: number; // 1-4
}

// ============ Reverse Graph ============

export interface ReverseGraph {
  prereqOf: Map<string, Set<string>>;
  coreqOf: Map<string, Set<string>>;
}

export interface ForwardEdges {
  courseCode: string;
  prerequisites: Set<string>;
  corequisites: Set<string>;
}

// ============ Run Statistics ============

export interface ParseStats {
  total: number;
  withPrerequisites: number;
  withCorequisites: number;
  empty: number;
  errors: number;
}

export interface GraphStats {
  total: number;
  withPrereqFor: number;
  withCoreqFor: number;
  leaves: number;
}
