import Table from 'cli-table3';

const default_style: Table.TableConstructorOptions = {
  style: {
    head: ['green'],
  },
};

export default class BaseTable extends Table {
  constructor(opts: Table.TableConstructorOptions) {
    super({ ...default_style, ...opts });
  }
}
