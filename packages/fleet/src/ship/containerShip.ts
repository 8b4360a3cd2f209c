/**
 * Container Fleet - Container Ship
 *
 * A ship holds an ordered list of containers and enforces two capacity limits
 * on every load: container count and total weight (tare + cargo). Membership is
 * by identity; a container is held at most once per ship.
 *
 * Replace removes the old container before the new one is checked, so a failed
 * replacement leaves neither on board. Transfer checks the destination first,
 * so a failed transfer leaves both ships as they were.
 */

import { Container, ContainerShip, LoadCheckResult } from '../types';
import { ContainerShipSpec, containerShipSpecSchema, parseSpec } from '../schema';
import { CapacityError, DuplicateContainerError, NotFoundError } from '../errors';
import { emptyCargo, grossWeight } from '../containers';

export function createContainerShip(spec: ContainerShipSpec): ContainerShip {
  const parsed = parseSpec(containerShipSpecSchema, spec, 'container ship spec');
  return { ...parsed, containers: [] };
}

export function hasContainer(ship: ContainerShip, container: Container): boolean {
  return ship.containers.includes(container);
}

export function calculateShipWeight(ship: ContainerShip): number {
  return ship.containers.reduce((sum, c) => sum + grossWeight(c), 0);
}

export function canLoadContainer(ship: ContainerShip, container: Container): LoadCheckResult {
  const projected_count = ship.containers.length + 1;
  const projected_weight = calculateShipWeight(ship) + grossWeight(container);

  if (hasContainer(ship, container)) {
    return { ok: false, reason: 'DUPLICATE', projected_count, projected_weight };
  }
  if (projected_count > ship.max_container_count) {
    return { ok: false, reason: 'CONTAINER_COUNT', projected_count, projected_weight };
  }
  // max_weight_tons is compared against summed kilograms without conversion
  if (projected_weight > ship.max_weight_tons) {
    return { ok: false, reason: 'WEIGHT', projected_count, projected_weight };
  }
  return { ok: true, projected_count, projected_weight };
}

function removeContainer(ship: ContainerShip, container: Container): void {
  const index = ship.containers.indexOf(container);
  if (index >= 0) {
    ship.containers.splice(index, 1);
  }
}

export function loadContainer(ship: ContainerShip, container: Container): void {
  const check = canLoadContainer(ship, container);
  if (check.reason === 'DUPLICATE') {
    throw new DuplicateContainerError(container.serial_number);
  }
  if (!check.ok) {
    throw new CapacityError();
  }
  ship.containers.push(container);
}

export function unloadContainer(ship: ContainerShip, container: Container): void {
  if (!hasContainer(ship, container)) {
    throw new NotFoundError(container.serial_number);
  }
  emptyCargo(container);
  removeContainer(ship, container);
}

export function replaceContainer(ship: ContainerShip, existing: Container, replacement: Container): void {
  if (!hasContainer(ship, existing)) {
    throw new NotFoundError(existing.serial_number, 'Container to replace not found on the ship.');
  }
  removeContainer(ship, existing);
  loadContainer(ship, replacement);
}

export function transferContainer(ship: ContainerShip, container: Container, target: ContainerShip): void {
  if (!hasContainer(ship, container)) {
    throw new NotFoundError(container.serial_number, 'Container not found for transfer.');
  }
  loadContainer(target, container);
  removeContainer(ship, container);
}
