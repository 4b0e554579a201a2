import { BrokerConnectionManager } from '@common/kafka/broker-connection.manager';
import { BrokerConnectionState } from '@common/kafka/broker-client';
import { ErrorCode } from '@common/exception';
import { InMemoryBroker } from '../helpers/in-memory-broker';
import { testKafkaSettings } from '../helpers/fixtures';

const message = (value: string) => [{ key: 'swn', value }];

describe('BrokerConnectionManager', () => {
  let broker: InMemoryBroker;
  let connection: BrokerConnectionManager;

  beforeEach(() => {
    broker = new InMemoryBroker();
    connection = new BrokerConnectionManager(broker, testKafkaSettings());
  });

  afterEach(async () => {
    broker.hangOnDisconnect = false;
    await connection.dispose();
  });

  it('given: 브로커가 내려가 있음 / when: 생성 / then: 연결을 시도하지 않으므로 실패하지 않음', () => {
    // given
    broker.available = false;

    // when
    const lazy = new BrokerConnectionManager(broker, testKafkaSettings());
    const channel = lazy.createChannel();

    // then
    expect(channel).toBeDefined();
    expect(lazy.connectionState).toBe(BrokerConnectionState.DISCONNECTED);
    expect(broker.connectAttempts).toBe(0);
  });

  it('given: 브로커가 나중에 올라옴 / when: 첫 발행 / then: 그때 연결하고 발행함', async () => {
    // given
    broker.available = false;
    const channel = connection.createChannel();
    broker.available = true;

    // when
    const metadata = await channel.publish('t', message('hello'));

    // then
    expect(metadata).toEqual([{ topicName: 't', partition: 0, errorCode: 0, offset: '0' }]);
    expect(connection.isConnected).toBe(true);
    expect(broker.messages('t').map((m) => m.value?.toString('utf8'))).toEqual(['hello']);
  });

  it('동시에 들어온 첫 발행은 하나의 연결 시도를 공유한다', async () => {
    // given
    const channel = connection.createChannel();

    // when
    await Promise.all([
      channel.publish('t', message('a')),
      channel.publish('t', message('b')),
      connection.connect(),
    ]);

    // then
    expect(broker.producersCreated).toBe(1);
    expect(broker.connectAttempts).toBe(1);
    expect(broker.messages('t')).toHaveLength(2);
  });

  it('given: 브로커에 연결할 수 없음 / when: 발행 / then: BROKER_UNAVAILABLE 로 실패하고 FAULTED', async () => {
    // given
    broker.available = false;
    const channel = connection.createChannel();

    // when
    const promise = channel.publish('t', message('hello'));

    // then
    await expect(promise).rejects.toMatchObject({
      errorCode: ErrorCode.BROKER_UNAVAILABLE,
    });
    expect(connection.connectionState).toBe(BrokerConnectionState.FAULTED);
  });

  it('given: 발행 중 연결이 끊김 / when: 브로커가 돌아온 뒤 발행 / then: 새 Producer 로 다시 연결함', async () => {
    // given
    const channel = connection.createChannel();
    await channel.publish('t', message('first'));
    broker.available = false;
    await expect(channel.publish('t', message('lost'))).rejects.toThrow(
      'Connection refused',
    );
    expect(connection.connectionState).toBe(BrokerConnectionState.FAULTED);

    // when
    broker.available = true;
    await channel.publish('t', message('second'));

    // then
    expect(connection.connectionState).toBe(BrokerConnectionState.CONNECTED);
    expect(broker.producersCreated).toBe(2);
    expect(broker.messages('t').map((m) => m.value?.toString('utf8'))).toEqual([
      'first',
      'second',
    ]);
  });

  describe('dispose', () => {
    it('dispose 이후의 사용은 BROKER_DISPOSED 로 실패한다', async () => {
      // given
      const channel = connection.createChannel();
      await channel.publish('t', message('hello'));

      // when
      await connection.dispose();

      // then
      expect(connection.isConnected).toBe(false);
      expect(() => connection.createChannel()).toThrow(
        expect.objectContaining({ errorCode: ErrorCode.BROKER_DISPOSED }),
      );
      expect(() => connection.createConsumer('g')).toThrow(
        expect.objectContaining({ errorCode: ErrorCode.BROKER_DISPOSED }),
      );
      await expect(channel.publish('t', message('late'))).rejects.toMatchObject({
        errorCode: ErrorCode.BROKER_DISPOSED,
      });
    });

    it('추적 중인 Consumer 도 함께 연결을 끊는다', async () => {
      // given
      const consumer = connection.createConsumer('g');
      await consumer.connect();

      // when
      await connection.dispose();

      // then
      expect(broker.consumers[0].connected).toBe(false);
    });

    it('종료가 제한 시간을 넘으면 기다리지 않고 끝낸다', async () => {
      // given
      await connection.createChannel().publish('t', message('hello'));
      broker.hangOnDisconnect = true;

      // when
      const startedAt = Date.now();
      await connection.dispose(20);

      // then
      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(connection.connectionState).toBe(BrokerConnectionState.DISCONNECTED);
    });
  });
});
