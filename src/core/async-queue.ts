// FIFO hand-off between producers and awaiting consumers.
export class AsyncQueue<T> {
  private items: T[] = [];
  private resolvers: Array<(value: T) => void> = [];

  push(item: T) {
    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver(item);
      return;
    }
    this.items.push(item);
  }

  next(): Promise<T> {
    if (this.items.length > 0) {
      const [head] = this.items.splice(0, 1);
      return Promise.resolve(head);
    }
    return new Promise<T>((resolve) => {
      this.resolvers.push(resolve);
    });
  }
}
