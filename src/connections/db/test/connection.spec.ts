import { runTransaction } from '../connection';

describe('runTransaction', () => {
  const fakeClient = (failOn?: string) => {
    const statements: string[] = [];
    return {
      statements,
      release: jest.fn(),
      async query(text: string) {
        statements.push(text);
        if (text === failOn) {
          throw new Error(`${text} failed`);
        }
        return {};
      },
    };
  };

  it('should commit and release the client', async () => {
    const client = fakeClient();

    const result = await runTransaction(client, async () => 'done');

    expect(result).toBe('done');
    expect(client.statements).toEqual(['BEGIN', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledWith();
  });

  it('should roll back and rethrow when the work fails', async () => {
    const client = fakeClient();

    await expect(
      runTransaction(client, async () => {
        throw new Error('work failed');
      })
    ).rejects.toThrow('work failed');

    expect(client.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledWith();
  });

  it('should keep the original error and discard the client when ROLLBACK fails', async () => {
    const client = fakeClient('ROLLBACK');

    await expect(
      runTransaction(client, async () => {
        throw new Error('work failed');
      })
    ).rejects.toThrow('work failed');

    expect(client.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledWith(new Error('ROLLBACK failed'));
  });
});
