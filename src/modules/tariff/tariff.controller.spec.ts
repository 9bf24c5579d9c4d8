import { Test, TestingModule } from '@nestjs/testing';
import { TariffController } from './tariff.controller';
import { TariffService } from './tariff.service';

describe('TariffController', () => {
  let controller: TariffController;
  let tariffService: {
    evaluateCost: jest.Mock;
    loadTariffs: jest.Mock;
    editTariff: jest.Mock;
    deleteTariff: jest.Mock;
    listTariffs: jest.Mock;
  };

  beforeEach(async () => {
    tariffService = {
      evaluateCost: jest.fn(),
      loadTariffs: jest.fn(),
      editTariff: jest.fn(),
      deleteTariff: jest.fn(),
      listTariffs: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [TariffController],
      providers: [{ provide: TariffService, useValue: tariffService }],
    }).compile();

    controller = module.get<TariffController>(TariffController);
  });

  it('should encode the cost as a JSON number', async () => {
    tariffService.evaluateCost.mockResolvedValue(300);

    await expect(
      controller.evaluateCost({ insurance_date: '2024-01-01', cargo_type: 'glass', declared_price: 200 }),
    ).resolves.toBe('300');
  });

  it('should return the affected tariffs of a load', async () => {
    const affected = [{ date: '2024-01-01', cargo_type: 'glass', rate: 3 }];
    tariffService.loadTariffs.mockResolvedValue(affected);

    await expect(controller.load(affected)).resolves.toBe(affected);
  });

  it('should acknowledge a successful edit', async () => {
    tariffService.editTariff.mockResolvedValue({ date: '2024-01-01', cargo_type: 'glass', rate: 4 });

    await expect(
      controller.update({ tariff_date: '2024-01-01', cargo_type: 'glass', new_rate: 4 }),
    ).resolves.toEqual({ detail: 'Success' });
  });

  it('should return the deleted tariff', async () => {
    tariffService.deleteTariff.mockResolvedValue({ date: '2024-01-01', cargo_type: 'glass', rate: 4 });

    await expect(controller.delete({ tariff_date: '2024-01-01', cargo_type: 'glass' })).resolves.toEqual({
      date: '2024-01-01',
      cargo_type: 'glass',
      rate: 4,
    });
  });

  it('should list tariffs of a date', async () => {
    tariffService.listTariffs.mockResolvedValue([]);

    await expect(controller.list('2024-01-01')).resolves.toEqual([]);
    expect(tariffService.listTariffs).toHaveBeenCalledWith('2024-01-01');
  });
});
