import { ContainerShip, ShipReport } from '../types';
import { describeContainerKind } from '../containers';
import { FleetLogger } from '../logging/logger';
import { calculateShipWeight } from './containerShip';

export function getShipReport(ship: ContainerShip): ShipReport {
  return {
    max_speed_knots: ship.max_speed_knots,
    max_container_count: ship.max_container_count,
    max_weight_tons: ship.max_weight_tons,
    container_count: ship.containers.length,
    total_weight: calculateShipWeight(ship),
    containers: ship.containers.map((c) => ({
      serial_number: c.serial_number,
      cargo_mass_kg: c.cargo_mass_kg,
      type_name: describeContainerKind(c),
    })),
  };
}

export function formatShipReport(report: ShipReport): string[] {
  const header =
    `Ship speed: ${report.max_speed_knots} knots, ` +
    `Max containers: ${report.max_container_count}, ` +
    `Max weight: ${report.max_weight_tons} tons`;

  return [
    header,
    ...report.containers.map(
      (line) => `Container serial: ${line.serial_number}, Cargo mass: ${line.cargo_mass_kg} kg, Type: ${line.type_name}`
    ),
  ];
}

export function printDetails(ship: ContainerShip, logger: FleetLogger): ShipReport {
  const report = getShipReport(ship);
  formatShipReport(report).forEach((line) => logger.info(line));
  return report;
}
