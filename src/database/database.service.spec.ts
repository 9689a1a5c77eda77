import { DatabaseService } from './database.service';
import { invoices } from './schema';

describe('DatabaseService', () => {
  it('creates the tables on migrate', () => {
    const database = new DatabaseService(':memory:');
    database.migrate();

    expect(database.db.select().from(invoices).all()).toEqual([]);

    database.onModuleDestroy();
  });

  it('closes the connection when the module is destroyed', () => {
    const database = new DatabaseService(':memory:');
    database.migrate();

    database.onModuleDestroy();

    expect(() => database.db.select().from(invoices).all()).toThrow('The database connection is not open');
  });
});
