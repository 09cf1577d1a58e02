// src/core/ArchiveMember.ts

export interface ArchiveMemberInit {
    name: string;
    size: number;
    /** Si el backend no conoce el tamaño comprimido se usa `size` */
    compressedSize?: number;
    isDir: boolean;
}

/**
 * Instantánea inmutable de una entrada del archivo.
 * Se construye de nuevo en cada consulta; nunca es una referencia viva al archivo.
 */
export class ArchiveMember {
    /** Ruta dentro del archivo, separada con '/' */
    readonly name: string;
    /** Tamaño sin comprimir (0 para directorios) */
    readonly size: number;
    readonly compressedSize: number;
    readonly isDir: boolean;
    readonly isFile: boolean;

    constructor(init: ArchiveMemberInit) {
        this.name = init.name;
        this.isDir = init.isDir;
        this.isFile = !init.isDir;
        this.size = init.isDir ? 0 : init.size;
        this.compressedSize = init.isDir ? 0 : init.compressedSize ?? this.size;
        Object.freeze(this);
    }

    equals(other: ArchiveMember): boolean {
        return (
            this.name === other.name &&
            this.size === other.size &&
            this.compressedSize === other.compressedSize &&
            this.isDir === other.isDir
        );
    }

    toJSON(): ArchiveMemberInit & { isFile: boolean } {
        return {
            name: this.name,
            size: this.size,
            compressedSize: this.compressedSize,
            isDir: this.isDir,
            isFile: this.isFile,
        };
    }

    toString(): string {
        return this.name;
    }
}
