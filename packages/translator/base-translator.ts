/**
 * Base Translator
 *
 * One abstract method per node type; `translate` dispatches on `nodeType`.
 * Adding a node type without a case here fails to compile.
 */

import { TranslationError } from '../errors.js';
import type {
  AssignNode,
  AstNode,
  AttributeDependencyNode,
  ConditionalJoinNode,
  DefinitionNode,
  InclusionNode,
  JoinNode,
  PrimaryKeyNode,
  ProjectNode,
  RelationNode,
  RenameNode,
  SelectNode,
  SetOperatorNode,
} from '../compiler/nodes.js';

export abstract class BaseTranslator<T> {
  translate(node: AstNode): T {
    switch (node.nodeType) {
      case 'relation':
        return this.relation(node);
      case 'definition':
        return this.definition(node);
      case 'select':
        return this.select(node);
      case 'project':
        return this.project(node);
      case 'rename':
        return this.rename(node);
      case 'assign':
        return this.assign(node);
      case 'crossJoin':
        return this.crossJoin(node);
      case 'naturalJoin':
        return this.naturalJoin(node);
      case 'thetaJoin':
        return this.thetaJoin(node);
      case 'fullOuterJoin':
        return this.fullOuterJoin(node);
      case 'leftOuterJoin':
        return this.leftOuterJoin(node);
      case 'rightOuterJoin':
        return this.rightOuterJoin(node);
      case 'union':
        return this.union(node);
      case 'difference':
        return this.difference(node);
      case 'intersect':
        return this.intersect(node);
      case 'primaryKey':
        return this.primaryKey(node);
      case 'multivaluedDependency':
        return this.multivaluedDependency(node);
      case 'functionalDependency':
        return this.functionalDependency(node);
      case 'inclusionEquivalence':
        return this.inclusionEquivalence(node);
      case 'inclusionSubsumption':
        return this.inclusionSubsumption(node);
      default:
        return unhandledNode(node);
    }
  }

  protected abstract relation(node: RelationNode): T;
  protected abstract definition(node: DefinitionNode): T;
  protected abstract select(node: SelectNode): T;
  protected abstract project(node: ProjectNode): T;
  protected abstract rename(node: RenameNode): T;
  protected abstract assign(node: AssignNode): T;
  protected abstract crossJoin(node: JoinNode): T;
  protected abstract naturalJoin(node: JoinNode): T;
  protected abstract thetaJoin(node: ConditionalJoinNode): T;
  protected abstract fullOuterJoin(node: ConditionalJoinNode): T;
  protected abstract leftOuterJoin(node: ConditionalJoinNode): T;
  protected abstract rightOuterJoin(node: ConditionalJoinNode): T;
  protected abstract union(node: SetOperatorNode): T;
  protected abstract difference(node: SetOperatorNode): T;
  protected abstract intersect(node: SetOperatorNode): T;
  protected abstract primaryKey(node: PrimaryKeyNode): T;
  protected abstract multivaluedDependency(node: AttributeDependencyNode): T;
  protected abstract functionalDependency(node: AttributeDependencyNode): T;
  protected abstract inclusionEquivalence(node: InclusionNode): T;
  protected abstract inclusionSubsumption(node: InclusionNode): T;
}

/** Reached only by values that bypass the type checker */
function unhandledNode(node: never): never {
  const nodeType: unknown = Reflect.get(Object(node), 'nodeType');
  throw new TranslationError(`No translation for node type '${String(nodeType)}'.`);
}
