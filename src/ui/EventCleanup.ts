export type EventRemover = () => void;

/**
 * Base for views that attach DOM listeners: tracks a remover per listener
 * so the view can detach them all at once.
 */
export class EventCleanup {
  private removers: EventRemover[] = [];

  protected trackRemover(remover: EventRemover): void {
    this.removers.push(remover);
  }

  /**
   * Listen for clicks on `target`, suppressing the default action (anchors
   * here carry a placeholder href).
   */
  protected listenForClicks(target: HTMLElement, handler: (event: MouseEvent) => void): void {
    const listener = (event: MouseEvent) => {
      event.preventDefault();
      handler(event);
    };
    target.addEventListener('click', listener);
    this.trackRemover(() => target.removeEventListener('click', listener));
  }

  cleanupRemovers(): void {
    const removers = this.removers;
    this.removers = [];
    removers.forEach(remove => remove());
  }

  get listenerCount(): number {
    return this.removers.length;
  }
}
