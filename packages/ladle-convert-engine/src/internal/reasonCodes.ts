export const ReasonCodes = {
  blockUnterminated: 'block.unterminated',
  blockUnexpectedEnd: 'block.unexpected_end',
  delimiterUnbalanced: 'block.unbalanced_delimiter',
  stringUnterminated: 'lexer.unterminated_string',
  heredocUnterminated: 'lexer.unterminated_heredoc',

  valueUnrecognized: 'value.unrecognized',
  valueLazy: 'value.lazy',
  valueUnknownConstant: 'value.unknown_constant',

  declarationInLoop: 'declaration.in_loop',
  declarationConditionalProperty: 'declaration.conditional_property',
  declarationNestedControlFlow: 'declaration.nested_control_flow',
  statementUnrecognized: 'statement.unrecognized',

  attributeConditional: 'attribute.conditional_assignment',
  attributeUnsupportedStatement: 'attribute.unsupported_statement',
  attributeUnresolved: 'attribute.unresolved_path',
  attributeCycle: 'attribute.reference_cycle',

  guardManualReview: 'guard.manual_review',
  guardConditionOpaque: 'guard.context_opaque',

  notifyUnresolvedTarget: 'notify.unresolved_target',
  notifyMalformed: 'notify.malformed',
  notifyBeforeTiming: 'notify.before_timing',

  schemaDuplicateNameProperty: 'schema.duplicate_name_property',
  schemaMissingRequired: 'schema.missing_required',
  schemaTypeMismatch: 'schema.type_mismatch',
  schemaUnknownProperty: 'schema.unknown_property',
  schemaUnknownAction: 'schema.unknown_action',
  schemaMalformedDeclaration: 'schema.malformed_declaration',

  mappingUnrecognizedType: 'mapping.unrecognized_type',
  mappingUnsupportedAction: 'mapping.unsupported_action',
  mappingDroppedProperty: 'mapping.dropped_property',
  mappingSearchQuery: 'mapping.search_query',
} as const

export type ReasonCode = (typeof ReasonCodes)[keyof typeof ReasonCodes]
