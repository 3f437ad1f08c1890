export interface ScheduleInit {
  id: string;
  name: string;
  homeId: string;
  selected?: boolean;
  awayTemp?: number;
  hgTemp?: number;
}

/**
 * Heating schedule of a home. `hgTemp` is the frost guard temperature.
 */
export class Schedule {
  readonly id: string;
  readonly name: string;
  readonly homeId: string;
  readonly selected: boolean;
  readonly awayTemp: number | undefined;
  readonly hgTemp: number | undefined;

  constructor(init: ScheduleInit) {
    this.id = init.id;
    this.name = init.name;
    this.homeId = init.homeId;
    this.selected = init.selected ?? false;
    this.awayTemp = init.awayTemp;
    this.hgTemp = init.hgTemp;
  }
}
