/**
 * Database-agnostic type categories, for mapping onto other type systems.
 */
export enum GenericDataKind {
	Boolean = 'Boolean',
	Int64 = 'Int64',
	Double = 'Double',
	DateTime = 'DateTime',
	Date = 'Date',
	String = 'String',
	Binary = 'Binary',
	Object = 'Object',
}
