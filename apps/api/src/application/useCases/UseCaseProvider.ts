export type SConstructor<T> = abstract new (...args: never[]) => T;

export class UseCaseProvider {
    private cache = new Map<SConstructor<unknown>, unknown>();
    private factories = new Map<SConstructor<unknown>, () => unknown>();

    register<T>(
        serviceType: SConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(serviceType, factory);
        this.cache.delete(serviceType);
    }

    get<T>(serviceType: SConstructor<T>): T {
        const cached = this.cache.get(serviceType);
        if (cached instanceof serviceType) {
            return cached;
        }

        const factory = this.factories.get(serviceType);
        if (!factory) {
            throw new Error(`Service ${serviceType.name} not registered`);
        }

        const instance = factory();
        if (!(instance instanceof serviceType)) {
            throw new Error(`Factory for ${serviceType.name} returned a different type`);
        }

        this.cache.set(serviceType, instance);
        return instance;
    }
}
