/**
 * @file entity-store.ts
 * @description Host-side component storage: providers, trigger cells and host buffers live on entities.
 *
 * @external-interactions
 * - `SubGraphRunner` pulls `ComputeNodeProvider` components by entity on every tick.
 *
 * @pitfalls
 * - Components are keyed by their constructor; one component per class per entity.
 *   Inserting a second instance of the same class replaces the first.
 */
import { action, makeObservable, observable } from 'mobx';

export type EntityId = number;

export type ComponentType<T> = abstract new (...args: never[]) => T;

export class EntityStore {
  private readonly entities = observable.map<EntityId, Map<unknown, object>>({}, { deep: false });

  private nextId = 1;

  constructor() {
    makeObservable(this);
  }

  @action
  spawn(...components: object[]): EntityId {
    const id = this.nextId++;
    const map = new Map<unknown, object>();
    components.forEach(c => map.set(c.constructor, c));
    this.entities.set(id, map);
    return id;
  }

  @action
  insert(entity: EntityId, component: object) {
    const map = this.entities.get(entity);
    if (!map) {
      throw new Error(`Entity ${entity} does not exist`);
    }
    map.set(component.constructor, component);
    // Replace the inner map so observers of the entity see the change.
    this.entities.set(entity, new Map(map));
  }

  @action
  despawn(entity: EntityId): boolean {
    return this.entities.delete(entity);
  }

  has(entity: EntityId): boolean {
    return this.entities.has(entity);
  }

  get<T>(entity: EntityId, type: ComponentType<T>): T | undefined {
    const component = this.entities.get(entity)?.get(type);
    return component instanceof type ? component : undefined;
  }

  query<T>(type: ComponentType<T>): [EntityId, T][] {
    const result: [EntityId, T][] = [];
    this.entities.forEach((components, id) => {
      const component = components.get(type);
      if (component instanceof type) result.push([id, component]);
    });
    return result;
  }
}
