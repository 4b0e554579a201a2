import { DataSource } from 'typeorm';
import { DatabaseService } from '@common/database/database.service';
import {
  DomainException,
  ErrorCode,
  RepositoryException,
  ValidationException,
} from '@common/exception';

describe('DatabaseService.runInTransaction', () => {
  let transaction: jest.Mock;
  let database: DatabaseService;

  beforeEach(() => {
    transaction = jest.fn();
    jest
      .spyOn(DataSource.prototype, 'initialize')
      .mockResolvedValue({ transaction } as any as DataSource);
    database = new DatabaseService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('드라이버 연결 오류는 PERSISTENCE_FAILED 로 감싼다', async () => {
    // given
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:3306');
    transaction.mockRejectedValue(cause);

    // when
    const promise = database.runInTransaction(async () => 1);

    // then
    await expect(promise).rejects.toBeInstanceOf(RepositoryException);
    await expect(promise).rejects.toMatchObject({
      errorCode: ErrorCode.PERSISTENCE_FAILED,
      cause,
      message: `${ErrorCode.PERSISTENCE_FAILED.message}: connect ECONNREFUSED 127.0.0.1:3306`,
    });
  });

  it.each([
    ['ValidationException', new ValidationException(ErrorCode.ORDER_VALIDATION_FAILED)],
    ['DomainException', new DomainException(ErrorCode.INVALID_ORDER_ITEM)],
    ['RepositoryException', new RepositoryException(ErrorCode.ORDER_DATA_REJECTED)],
  ])('계층 예외 %s 는 그대로 전파한다', async (_name, error) => {
    transaction.mockRejectedValue(error);

    await expect(database.runInTransaction(async () => 1)).rejects.toBe(error);
  });

  it('DataSource 초기화 실패도 PERSISTENCE_FAILED', async () => {
    jest
      .spyOn(DataSource.prototype, 'initialize')
      .mockRejectedValue(new Error('access denied'));

    await expect(database.runInTransaction(async () => 1)).rejects.toMatchObject({
      errorCode: ErrorCode.PERSISTENCE_FAILED,
    });
    expect(transaction).not.toHaveBeenCalled();
  });
});
