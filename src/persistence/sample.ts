import type { QueryConfigInput } from './config.js';

/** Products above 100 with their category name, most expensive first. */
export const sampleConfig: QueryConfigInput = {
  tables: [{ name: 'products', alias: 'p', fields: ['product_id', 'product_name', 'price'] }],
  joins: [
    {
      leftAlias: 'p',
      rightTable: 'categories',
      rightAlias: 'c',
      joinType: 'LEFT',
      onLeft: 'category_id',
      onRight: 'category_id',
      rightFields: ['category_name'],
    },
  ],
  filters: [{ tableAlias: 'p', field: 'price', operator: 'GREATER', value: 100, logic: 'AND' }],
  orderBys: [{ tableAlias: 'p', field: 'price', direction: 'DESC' }],
};
