import { describe, it, expect } from 'vitest';
import { QueryAssembly, filterCondition, sortSpec } from '../src/QueryAssembly.js';
import { conditionText } from '../src/explain/labels.js';

function productsQuery(): QueryAssembly {
  const q = new QueryAssembly();
  q.addTable('products', 'p', ['product_id', 'product_name', 'price']);
  q.addJoin('p', 'categories', 'c', 'category_id', 'category_id', 'LEFT', ['category_name']);
  q.addFilter('p', 'price', 'GREATER', 100);
  q.addOrderBy('p', 'price', 'DESC');
  return q;
}

describe('conditionText', () => {
  it('uses plain-language operator labels', () => {
    expect(conditionText(filterCondition('p', 'price', 'GREATER_EQUAL', 10))).toBe('p.price is at least 10');
    expect(conditionText(filterCondition('c', 'name', 'LIKE', 'A%'))).toBe('c.name matches A%');
    expect(conditionText(filterCondition('o', 'shipped_at', 'IS_NULL', 'ignored'))).toBe('o.shipped_at is empty');
  });

  it('lists values and ranges unquoted', () => {
    expect(conditionText(filterCondition('p', 'category', 'IN', ['toys', 'games']))).toBe('p.category is one of toys, games');
    expect(conditionText(filterCondition('p', 'price', 'BETWEEN', [10, 20]))).toBe('p.price is between 10 and 20');
  });

  it('leaves out a missing value', () => {
    expect(conditionText(filterCondition('p', 'price', 'EQUALS'))).toBe('p.price equals');
  });
});

describe('explain', () => {
  it('describes tables, joins, filters and ordering', () => {
    expect(productsQuery().describe()).toBe(
      'Query data, from **products** (fields: product_id, product_name, price), ' +
        'left join **categories** (ON p.category_id = c.category_id).' +
        '\n\n**Filters**:\n- p.price is greater than 100' +
        '\n\n**Ordering**: by p.price descending',
    );
  });

  it('marks every filter after the first with its logic operator', () => {
    const q = new QueryAssembly();
    q.addTable('orders', 'o');
    q.addFilter('o', 'status', 'EQUALS', 'paid', 'OR');
    q.addFilter('o', 'status', 'EQUALS', 'shipped', 'OR');
    q.addFilter('o', 'total', 'LESS', 50);
    expect(q.describe()).toBe(
      'Query data, from **orders**.' +
        '\n\n**Filters**:\n- o.status equals paid\n- **OR** o.status equals shipped\n- **AND** o.total is less than 50',
    );
  });

  it('covers grouping, computed columns, window functions and limits', () => {
    const q = new QueryAssembly();
    q.addTable('orders', 'o', ['customer_id']);
    q.setDistinct();
    q.setGroupBy(['o.customer_id'], [filterCondition('o', 'total', 'GREATER', 10)]);
    q.addCaseWhen('tier', [{ condition: filterCondition('o', 'total', 'GREATER', 100), thenValue: 'gold' }], 'basic');
    q.addWindowFunction('ROW_NUMBER', 'o', undefined, ['o.customer_id'], [sortSpec('o', 'created_at', 'DESC')], 'rn');
    q.addWindowFunction('SUM', 'o', 'total');
    q.setLimit(1, 3);

    expect(q.describe()).toBe(
      [
        'Query distinct rows, from **orders** (fields: customer_id).',
        '**Grouping**: by o.customer_id, having o.total is greater than 10',
        '**Computed columns**:\n- tier (1 branch)',
        '**Window functions**:\n- rn: ROW_NUMBER partitioned by o.customer_id ordered by o.created_at descending' +
          '\n- (unnamed): SUM of o.total',
        '**Limit**: return 1 row, skipping the first 3',
      ].join('\n\n'),
    );
  });

  it('leaves out sections without content', () => {
    const q = new QueryAssembly();
    q.addTable('orders', 'o');
    q.setGroupBy([]);
    q.setLimit(0, 10);
    expect(q.describe()).toBe('Query data, from **orders**.\n\n**Grouping**: by (no fields)');
  });
});

describe('toRequirements', () => {
  it('restates the query as a request', () => {
    expect(productsQuery().toRequirements()).toBe(
      [
        'I need a SQL query with the following requirements:',
        '**Data sources**:' +
          '\n- Primary table: products (alias: p)\n  Fields needed: product_id, product_name, price' +
          '\n- Related table: categories (alias: c)\n  Fields needed: category_name',
        '**Table relationships**:\n- p left join c\n  Join condition: p.category_id = c.category_id',
        '**Filter conditions**:\n- p.price is greater than 100',
        '**Result ordering**:\n- by p.price descending',
        'Please write the SQL query that satisfies these requirements.',
      ].join('\n\n'),
    );
  });

  it('has only the header and closing for an empty query', () => {
    expect(new QueryAssembly().toRequirements()).toBe(
      'I need a SQL query with the following requirements:\n\nPlease write the SQL query that satisfies these requirements.',
    );
  });

  it('spells out computed columns, windows, grouping and limits', () => {
    const q = new QueryAssembly();
    q.setDistinct();
    q.addTable('orders', 'o');
    q.addFilter('o', 'total', 'GREATER', 0);
    q.addFilter('o', 'status', 'NOT_IN', ['void'], 'OR');
    q.setGroupBy(['o.status'], [filterCondition('o', 'total', 'LESS', 1000)]);
    q.addCaseWhen(
      'size',
      [
        { condition: filterCondition('o', 'total', 'GREATER', 1000), thenValue: 'large' },
        { condition: filterCondition('o', 'total', 'GREATER', 100), thenValue: 'medium' },
      ],
      'small',
    );
    q.addWindowFunction('RANK', 'o', undefined, ['o.status'], [sortSpec('o', 'total')], 'pos');
    q.setLimit(20, 40);

    expect(q.toRequirements()).toBe(
      [
        'I need a SQL query with the following requirements:',
        '**Deduplication**: the result rows must be distinct',
        '**Data sources**:\n- Primary table: orders (alias: o)',
        '**Filter conditions**:\n- o.total is greater than 0\n- OR o.status is not one of void',
        '**Grouping**: group by o.status\n- Having o.total is less than 1000',
        '**Computed columns**:\n- Create column size assigned by these conditions:' +
          '\n  Condition 1: if o.total is greater than 1000, the value is large' +
          '\n  Condition 2: if o.total is greater than 100, the value is medium' +
          '\n  Otherwise the value is small',
        '**Window functions**:\n- Compute RANK, named pos\n  Partition by o.status\n  Order by o.total ascending',
        '**Row limit**: return only 20 rows, skipping the first 40',
        'Please write the SQL query that satisfies these requirements.',
      ].join('\n\n'),
    );
  });
});
