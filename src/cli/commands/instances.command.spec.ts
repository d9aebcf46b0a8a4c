import { Test } from '@nestjs/testing';
import { InquirerService } from 'nest-commander';
import { EVOLUTION_CLIENT, INSTANCE_PORT } from '../../ports';
import {
  FakeEvolutionClient,
  ok,
} from '../../../test/fakes/fake-evolution-client';
import { InMemoryInstances } from '../../../test/fakes/in-memory-stores';
import { RecordingOutput } from '../../../test/fakes/recording-output';
import { CliOutput } from '../cli-output.service';
import { CliDatabase } from '../services/cli-database.service';
import { InstanceManagerService } from '../services/instance-manager.service';
import { CONFIRM_DISCONNECT } from './confirm.questions';
import { InstancesCommand } from './instances.command';

describe('InstancesCommand', () => {
  let client: FakeEvolutionClient;
  let output: RecordingOutput;
  let ask: jest.Mock;
  let connect: jest.Mock;
  let command: InstancesCommand;

  beforeEach(async () => {
    client = new FakeEvolutionClient();
    output = new RecordingOutput();
    ask = jest.fn();
    connect = jest.fn().mockResolvedValue(undefined);

    const moduleRef = await Test.createTestingModule({
      providers: [
        InstancesCommand,
        InstanceManagerService,
        { provide: EVOLUTION_CLIENT, useValue: client },
        { provide: INSTANCE_PORT, useValue: new InMemoryInstances() },
        { provide: CliDatabase, useValue: { connect } },
        { provide: InquirerService, useValue: { ask } },
        { provide: CliOutput, useValue: output },
      ],
    }).compile();

    command = moduleRef.get(InstancesCommand);
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it('lista las instancias en una tabla', async () => {
    client.respond = () =>
      ok([{ name: 'ventas', connectionStatus: 'open', profileName: 'Ventas' }]);

    await command.run(['list']);

    expect(output.stdout).toEqual([
      '+----------+--------+-------+---------+',
      '| Instance | Status | Owner | Profile |',
      '+----------+--------+-------+---------+',
      '| ventas   | open   | -     | Ventas  |',
      '+----------+--------+-------+---------+',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('sync abre la base antes de escribir', async () => {
    client.respond = () => ok([{ name: 'ventas', connectionStatus: 'open' }]);

    await command.run(['sync']);

    expect(connect).toHaveBeenCalledTimes(1);
    expect(output.stdout).toEqual(['✅ Synchronized 1 instances.']);
  });

  it('rechaza una acción desconocida', async () => {
    await command.run(['restart']);

    expect(output.stderr).toEqual(['❌ Unknown action: restart']);
    expect(output.stdout).toEqual([
      'Valid actions: list, sync, connect, disconnect',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('connect exige el nombre de la instancia', async () => {
    await command.run(['connect']);

    expect(output.stderr).toEqual([
      '❌ The connect action needs an instance name.',
    ]);
    expect(process.exitCode).toBe(1);
    expect(client.calls).toHaveLength(0);
  });

  it('disconnect pide confirmación', async () => {
    ask.mockResolvedValue({ confirmed: false });

    await command.run(['disconnect', 'ventas']);

    expect(ask).toHaveBeenCalledWith(CONFIRM_DISCONNECT, undefined);
    expect(output.stdout).toEqual(['Cancelled.']);
    expect(client.calls).toHaveLength(0);
  });

  it('disconnect con --yes no pregunta', async () => {
    await command.run(['disconnect', 'ventas'], { yes: true });

    expect(ask).not.toHaveBeenCalled();
    expect(client.calls[0]).toMatchObject({ method: 'logout', instance: 'ventas' });
    expect(output.stdout).toEqual(['✅ Instance ventas disconnected.']);
  });
});
