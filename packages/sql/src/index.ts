export {
	readHeaderComments,
	splitStatements,
	type SqlSplitError,
	type SqlSplitErrorCode,
	type SqlSplitResult,
	type SqlSplitSuccess
} from "./split";
export {
	classifyStatement,
	splitTopLevelList,
	unquoteIdentifier,
	type ClassifiedStatement,
	type CopyRowsStatement,
	type DropTableStatement,
	type ForeignKeysStatement,
	type OtherStatement,
	type TransactionControlStatement
} from "./classify";
