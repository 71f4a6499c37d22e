export { Orm, type OrmOptions } from './orm';
export { Table, TableQuery, TableRecord } from './table';
